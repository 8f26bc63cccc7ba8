/**
 * Content Sources
 *
 * Structured profile and project records, and their conversion into
 * ingestion requests. Each profile section becomes its own source so
 * re-ingesting one section never drops the others.
 */

import { z } from 'zod';
import type { IngestRequest, SourceType } from './types';

// =============================================================================
// Schemas
// =============================================================================

const SkillSchema = z.union([
    z.string(),
    z.object({
        name: z.string(),
        level: z.string().optional(),
        years: z.number().nonnegative().optional(),
    }),
]);

const ExperienceSchema = z.union([
    z.string(),
    z.object({
        title: z.string(),
        company: z.string().optional(),
        durationYears: z.number().nonnegative().optional(),
        description: z.string().optional(),
    }),
]);

const EducationSchema = z.union([
    z.string(),
    z.object({
        degree: z.string(),
        institution: z.string().optional(),
        year: z.union([z.string(), z.number()]).optional(),
    }),
]);

export const ProfileSchema = z.object({
    profileId: z.string().min(1),
    name: z.string().min(1),
    bio: z.string().optional(),
    resume: z.string().optional(),
    skills: z.array(SkillSchema).default([]),
    experience: z.array(ExperienceSchema).default([]),
    education: z.array(EducationSchema).default([]),
});

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

const TechSchema = z.union([
    z.string(),
    z.object({ name: z.string(), category: z.string().optional() }),
]);

const AchievementSchema = z.union([
    z.string(),
    z.object({ title: z.string(), description: z.string().optional() }),
]);

const ChallengeSchema = z.union([
    z.string(),
    z.object({
        title: z.string(),
        description: z.string().optional(),
        solution: z.string().optional(),
    }),
]);

export const ProjectSchema = z.object({
    projectId: z.string().min(1),
    title: z.string().min(1),
    url: z.string().url().optional(),
    description: z.string().optional(),
    detailedDescription: z.string().optional(),
    techStack: z.array(TechSchema).default([]),
    achievements: z.array(AchievementSchema).default([]),
    challenges: z.array(ChallengeSchema).default([]),
    learnings: z.string().optional(),
});

export type Project = z.infer<typeof ProjectSchema>;
export type ProjectInput = z.input<typeof ProjectSchema>;

// =============================================================================
// Formatters
// =============================================================================

export function formatSkills(skills: Profile['skills']): string {
    if (skills.length === 0) return '';

    const parts = skills.map(skill => {
        if (typeof skill === 'string') return skill;
        let text = skill.name;
        if (skill.level) text += ` (Level: ${skill.level})`;
        if (skill.years) text += ` - ${skill.years} years of experience`;
        return text;
    });
    return `Skills: ${parts.join(', ')}`;
}

export function formatExperience(experience: Profile['experience']): string {
    if (experience.length === 0) return '';

    const parts = experience.map(item => {
        if (typeof item === 'string') return item;
        let text = `Position: ${item.title}`;
        if (item.company) text += ` at ${item.company}`;
        if (item.durationYears) text += ` (${item.durationYears} years)`;
        if (item.description) text += `. ${item.description}`;
        return text;
    });
    return `Work Experience: ${parts.join('. ')}`;
}

export function formatEducation(education: Profile['education']): string {
    if (education.length === 0) return '';

    const parts = education.map(item => {
        if (typeof item === 'string') return item;
        let text = item.degree;
        if (item.institution) text += ` from ${item.institution}`;
        if (item.year !== undefined && item.year !== '') text += ` (${item.year})`;
        return text;
    });
    return `Education: ${parts.join('. ')}`;
}

export function formatTechStack(techStack: Project['techStack']): string {
    if (techStack.length === 0) return '';

    const parts = techStack.map(tech => {
        if (typeof tech === 'string') return tech;
        return tech.category ? `${tech.name} (${tech.category})` : tech.name;
    });
    return `Technologies used: ${parts.join(', ')}`;
}

export function formatAchievements(achievements: Project['achievements']): string {
    if (achievements.length === 0) return '';

    const parts = achievements.map(item => {
        if (typeof item === 'string') return item;
        return item.description ? `${item.title}: ${item.description}` : item.title;
    });
    return `Project Achievements: ${parts.join('. ')}`;
}

export function formatChallenges(challenges: Project['challenges']): string {
    if (challenges.length === 0) return '';

    const parts = challenges.map(item => {
        if (typeof item === 'string') return item;
        let text = `Challenge: ${item.title}`;
        if (item.description) text += ` - ${item.description}`;
        if (item.solution) text += ` Solution: ${item.solution}`;
        return text;
    });
    return `Project Challenges: ${parts.join('. ')}`;
}

// =============================================================================
// Requests
// =============================================================================

interface ProfileSection {
    sourceType: SourceType;
    section: string;
    title: string;
    text: string;
}

function profileSections(profile: Profile): ProfileSection[] {
    return [
        { sourceType: 'profile', section: 'bio', title: 'Bio', text: profile.bio ?? '' },
        { sourceType: 'resume', section: 'resume', title: 'Resume', text: profile.resume ?? '' },
        { sourceType: 'skills', section: 'skills', title: 'Skills', text: formatSkills(profile.skills) },
        {
            sourceType: 'experience',
            section: 'experience',
            title: 'Experience',
            text: formatExperience(profile.experience),
        },
        { sourceType: 'education', section: 'education', title: 'Education', text: formatEducation(profile.education) },
    ];
}

const hasText = (section: ProfileSection) => section.text.trim().length > 0;

/**
 * One request per non-empty profile section
 */
export function profileToRequests(profile: Profile): IngestRequest[] {
    return profileSections(profile)
        .filter(hasText)
        .map(({ sourceType, section, title, text }) => ({
            sourceType,
            sourceId: profile.profileId,
            sourceTitle: title,
            text,
            metadata: { section, profileId: profile.profileId },
        }));
}

/**
 * Source types of the profile sections that are empty; chunks stored for
 * them by an earlier ingest are stale
 */
export function emptyProfileSections(profile: Profile): SourceType[] {
    return profileSections(profile)
        .filter(section => !hasText(section))
        .map(section => section.sourceType);
}

/**
 * A project is one source; its sections are joined in a fixed order
 */
export function projectToRequest(project: Project): IngestRequest | null {
    const sections = [
        project.description ?? '',
        project.detailedDescription ?? '',
        formatTechStack(project.techStack),
        formatAchievements(project.achievements),
        formatChallenges(project.challenges),
        project.learnings ? `Learnings: ${project.learnings}` : '',
    ].filter(text => text.trim().length > 0);

    if (sections.length === 0) return null;

    const metadata: Record<string, unknown> = {
        section: 'project',
        projectId: project.projectId,
        projectTitle: project.title,
    };
    if (project.url) metadata.url = project.url;

    return {
        sourceType: 'project',
        sourceId: project.projectId,
        sourceTitle: project.title,
        text: sections.join('\n\n'),
        metadata,
    };
}
