/**
 * JSON document and JSON Lines helpers bound to a FileSystem.
 * Content is validated with a zod schema on the way in.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { isNotFoundError, type FileSystem } from './FileSystem';

// ============================================================================
// JSON document
// ============================================================================

/**
 * A single JSON document. Missing files read as `fallback()`.
 */
export class JSONFile<T> {
  constructor(
    private fs: FileSystem,
    private filePath: string,
    private schema: ZodType<T, ZodTypeDef, unknown>,
    private fallback: () => T
  ) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await this.fs.read(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) return this.fallback();
      throw error;
    }

    const parsed = this.schema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid data in ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    return parsed.data;
  }

  async write(value: T): Promise<void> {
    await this.fs.write(this.filePath, JSON.stringify(value, null, 2));
  }

  async delete(): Promise<void> {
    await this.fs.delete(this.filePath);
  }
}

// ============================================================================
// JSON Lines
// ============================================================================

/**
 * Append-only JSON Lines file. One object per line.
 */
export class JSONLFile<T> {
  constructor(
    private fs: FileSystem,
    private filePath: string,
    private schema: ZodType<T, ZodTypeDef, unknown>
  ) {}

  async append(obj: T): Promise<void> {
    await this.fs.append(this.filePath, JSON.stringify(obj) + '\n');
  }

  async readAll(): Promise<T[]> {
    let content: string;
    try {
      content = await this.fs.read(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const results: T[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;

      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        console.warn(`[JSONL] Skipping invalid JSON line: ${line.slice(0, 100)}`);
        continue;
      }

      const parsed = this.schema.safeParse(value);
      if (parsed.success) {
        results.push(parsed.data);
      } else {
        console.warn(`[JSONL] Skipping line that does not match schema: ${line.slice(0, 100)}`);
      }
    }

    return results;
  }

  async delete(): Promise<void> {
    await this.fs.delete(this.filePath);
  }
}
