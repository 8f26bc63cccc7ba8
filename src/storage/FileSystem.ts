/**
 * File System Abstraction
 * Durable stores write through this so tests can run against memory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

// ============================================================================
// Interface
// ============================================================================

export interface FileSystem {
  /** Read entire file content; rejects with an ENOENT error when missing */
  read(filePath: string): Promise<string>;

  /** Replace file content in one step (readers never see a partial file) */
  write(filePath: string, content: string): Promise<void>;

  /** Append content to file, creating it when missing */
  append(filePath: string, content: string): Promise<void>;

  exists(filePath: string): Promise<boolean>;

  /** Delete file; missing files are ignored */
  delete(filePath: string): Promise<void>;

  /** Create directory (recursive) */
  mkdir(dirPath: string): Promise<void>;
}

/**
 * True for the "no such file" error raised by either implementation
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

// ============================================================================
// Node.js implementation
// ============================================================================

export class RealFileSystem implements FileSystem {
  private tempCounter = 0;

  async read(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
  }

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));

    // Write beside the target, then rename over it
    const tempPath = `${filePath}.${process.pid}.${++this.tempCounter}.tmp`;
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  async append(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    await fs.appendFile(filePath, content, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async delete(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

// ============================================================================
// In-memory implementation (tests)
// ============================================================================

class MemoryFileNotFoundError extends Error {
  readonly code = 'ENOENT';

  constructor(filePath: string) {
    super(`ENOENT: no such file or directory, open '${filePath}'`);
    this.name = 'MemoryFileNotFoundError';
  }
}

export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private directories = new Set<string>();

  /** Number of completed writes, by path */
  readonly writeCounts = new Map<string, number>();

  async read(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw new MemoryFileNotFoundError(filePath);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    const key = this.normalizePath(filePath);
    await this.mkdir(path.dirname(key));
    this.files.set(key, content);
    this.writeCounts.set(key, (this.writeCounts.get(key) ?? 0) + 1);
  }

  async append(filePath: string, content: string): Promise<void> {
    const key = this.normalizePath(filePath);
    await this.mkdir(path.dirname(key));
    this.files.set(key, (this.files.get(key) ?? '') + content);
  }

  async exists(filePath: string): Promise<boolean> {
    const key = this.normalizePath(filePath);
    return this.files.has(key) || this.directories.has(key);
  }

  async delete(filePath: string): Promise<void> {
    this.files.delete(this.normalizePath(filePath));
  }

  async mkdir(dirPath: string): Promise<void> {
    let current = this.normalizePath(dirPath);
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.posix.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }

  /** Raw file content, for assertions */
  peek(filePath: string): string | undefined {
    return this.files.get(this.normalizePath(filePath));
  }

  listFiles(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private normalizePath(p: string): string {
    return path.posix.normalize(p.replace(/\\/g, '/'));
  }
}
