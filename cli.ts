#!/usr/bin/env node
/**
 * Portfolio RAG CLI
 *
 * Ingest portfolio content, ask questions and manage caches from the shell.
 */

import { program } from 'commander';
import { readFile } from 'fs/promises';
import {
  PortfolioRAGService,
  ProfileSchema,
  ProjectSchema,
  RagError,
  isSourceType,
  type CacheScope,
  type IngestResult,
  type QueryOptions,
  type RAGConfigOverrides,
} from './src/portfolio-rag';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

type GlobalOptions = {
  dataDir?: string;
  quiet?: boolean;
};

function createService(): PortfolioRAGService {
  const globals = program.opts<GlobalOptions>();
  const overrides: RAGConfigOverrides = {};
  if (globals.dataDir) overrides.dataDir = globals.dataDir;
  if (globals.quiet) overrides.quiet = true;
  return PortfolioRAGService.fromEnv(overrides);
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

function printIngestResult(label: string, result: IngestResult) {
  if (result.status === 'completed') {
    log(
      `✅ ${label}: ${result.chunksCreated} chunks, ${result.embeddingsGenerated} embedded (${result.jobId})`,
      colors.green
    );
  } else {
    log(`❌ ${label}: ${result.error ?? result.status} (${result.jobId})`, colors.red);
  }
}

program
  .name('portfolio-rag')
  .description('Portfolio question answering over ingested content')
  .version('1.0.0')
  .option('-d, --data-dir <dir>', 'data directory (default: ./data or PORTFOLIO_DATA_DIR)')
  .option('-q, --quiet', 'only print results and errors');

// Ingest command
program
  .command('ingest <file>')
  .description('Ingest a text file, or a profile/project JSON file')
  .option('--profile', 'file is a profile JSON document')
  .option('--project', 'file is a project JSON document')
  .option('-t, --type <sourceType>', 'source type for plain text')
  .option('-i, --id <sourceId>', 'source id for plain text')
  .option('--title <title>', 'source title for plain text')
  .option('-m, --metadata <json>', 'chunk metadata as JSON', '{}')
  .action(
    async (
      file: string,
      options: { profile?: boolean; project?: boolean; type?: string; id?: string; title?: string; metadata: string }
    ) => {
      const service = createService();
      const raw = await readFile(file, 'utf-8');

      if (options.profile) {
        const profile = ProfileSchema.parse(JSON.parse(raw));
        const results = await service.ingestProfile(profile);
        results.forEach((result, index) => printIngestResult(`profile section ${index + 1}`, result));
        return;
      }

      if (options.project) {
        const project = ProjectSchema.parse(JSON.parse(raw));
        const result = await service.ingestProject(project);
        if (result) printIngestResult(project.title, result);
        else log(`⚠️  ${project.title} has no content`, colors.yellow);
        return;
      }

      if (!options.type || !isSourceType(options.type) || !options.id) {
        throw new Error('Plain text ingestion needs --type <sourceType> and --id <sourceId>');
      }

      const metadata: unknown = JSON.parse(options.metadata);
      if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
        throw new Error('--metadata must be a JSON object');
      }

      const result = await service.ingest(
        options.type,
        options.id,
        options.title ?? options.id,
        raw,
        Object.fromEntries(Object.entries(metadata))
      );
      printIngestResult(`${options.type}/${options.id}`, result);
      if (result.status !== 'completed') process.exitCode = 1;
    }
  );

// Query command
program
  .command('query <question...>')
  .description('Ask a question about the portfolio')
  .option('-c, --context <sourceType>', 'only search one source type')
  .option('-s, --source <sourceId>', 'only search one source')
  .option('-k, --max-chunks <n>', 'chunks to retrieve', parseInteger)
  .option('--timeout <ms>', 'query time budget in milliseconds', parseInteger)
  .option('--json', 'print the full response as JSON')
  .action(
    async (
      words: string[],
      options: { context?: string; source?: string; maxChunks?: number; timeout?: number; json?: boolean }
    ) => {
      if (options.context !== undefined && !isSourceType(options.context)) {
        throw new Error(`Unknown source type: ${options.context}`);
      }

      const queryOptions: QueryOptions = {
        contextType: options.context,
        sourceId: options.source,
        maxChunks: options.maxChunks,
        timeoutMs: options.timeout,
      };

      const response = await createService().query(words.join(' '), queryOptions);

      if (options.json) {
        console.log(JSON.stringify(response, null, 2));
        return;
      }

      log(`\n${response.answer}\n`, colors.bright);
      log(
        `confidence ${response.confidence} · ${response.status} · ${response.responseTimeSeconds}s · ${response.tokensUsed} tokens`,
        colors.blue
      );
      for (const source of response.sources) {
        log(`  [${source.score}] ${source.sourceType}/${source.sourceId} - ${source.title}`);
      }
      if (response.timeout) process.exitCode = 2;
    }
  );

// Clear-cache command
program
  .command('clear-cache [scope]')
  .description('Clear cached embeddings, cached answers, or both')
  .action(async (scope: string = 'all') => {
    if (scope !== 'embeddings' && scope !== 'queries' && scope !== 'all') {
      throw new Error('scope must be one of: embeddings, queries, all');
    }
    const target: CacheScope = scope;
    const cleared = await createService().clearCache(target);
    log(`🧹 Cleared ${cleared} entries (${target})`, colors.green);
  });

// Stats command
program
  .command('stats')
  .description('Show chunk, cache, query and job statistics')
  .action(async () => {
    const stats = await createService().getStats();
    console.log(JSON.stringify(stats, null, 2));
  });

// Sweep command
program
  .command('sweep')
  .description('Remove expired embedding cache entries')
  .action(async () => {
    const removed = await createService().sweepExpiredEmbeddings();
    log(`🧹 Removed ${removed} expired embeddings`, colors.green);
  });

// Re-embed command
program
  .command('reembed')
  .description('Embed chunks that were stored without an embedding')
  .action(async () => {
    const result = await createService().regenerateMissingEmbeddings();
    log(`🔁 ${result.updated}/${result.processed} chunks embedded, ${result.failed} still missing`, colors.green);
  });

// Parse arguments
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof RagError ? `${error.code}: ${error.message}` : String(error);
    log(`\n❌ ${message}\n`, colors.red);
    process.exit(1);
  });
}
