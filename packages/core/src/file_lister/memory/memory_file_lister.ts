/**
 * MemoryFileLister - In-memory FileLister
 *
 * Simulates a project tree with a Map of path -> content. Directories are
 * implicit: a directory exists while at least one file lives under it.
 *
 * @module file_lister/memory/memory_file_lister
 */

import picomatch from 'picomatch';
import type { FileLister, FileListOptions, FileStats, MemoryFileListerOptions } from '../file_lister';
import { assertProjectPath, FileListerError, normalizeRelativePath } from '../file_lister';

function matchPatterns(patterns: string[], filePaths: string[]): string[] {
  const isMatch = picomatch(patterns.map(normalizeRelativePath), { dot: true });
  return filePaths.filter(filePath => isMatch(filePath));
}

function filterIgnored(filePaths: string[], ignorePatterns: string[]): string[] {
  if (!ignorePatterns.length) return filePaths;
  const isIgnored = picomatch(ignorePatterns, { dot: true });
  return filePaths.filter(filePath => !isIgnored(filePath));
}

function depthOf(filePath: string): number {
  return filePath.split('/').length;
}

/**
 * @example
 * ```typescript
 * const lister = new MemoryFileLister({
 *   files: { 'docs/adr/ADR-001-storage.md': '## Status\nAccepted' },
 * });
 * await lister.exists('docs/adr'); // true
 * ```
 */
export class MemoryFileLister implements FileLister {
  private readonly files: Map<string, string>;
  private readonly stats: Map<string, FileStats>;

  /**
   * [EARS-MFL01] Accepts both Map and Record<string, string>.
   */
  constructor(options: MemoryFileListerOptions = {}) {
    const entries = options.files instanceof Map
      ? Array.from(options.files.entries())
      : Object.entries(options.files ?? {});
    this.files = new Map(entries.map(([filePath, content]) => [normalizeRelativePath(filePath), content]));
    this.stats = options.stats ?? new Map();
  }

  /**
   * [EARS-FL01] Lists files matching glob patterns.
   * [EARS-MFL02] Filters with picomatch, sorted.
   * [EARS-MFL05] Rejects the paths FsFileLister rejects.
   */
  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      assertProjectPath(pattern, 'pattern');
    }
    let matched = matchPatterns(patterns, Array.from(this.files.keys()));

    if (options?.ignore?.length) {
      matched = filterIgnored(matched, options.ignore);
    }
    if (options?.maxDepth !== undefined) {
      const maxDepth = options.maxDepth;
      matched = matched.filter(filePath => depthOf(filePath) <= maxDepth);
    }

    return matched.sort();
  }

  /**
   * [EARS-FL02] A path exists as a file or as the parent of a file.
   */
  async exists(filePath: string): Promise<boolean> {
    assertProjectPath(filePath, 'path');
    const normalized = normalizeRelativePath(filePath);
    if (this.files.has(normalized)) return true;
    return this.isDirectory(normalized);
  }

  /**
   * [EARS-FL03] Reads file content as string.
   */
  async read(filePath: string): Promise<string> {
    assertProjectPath(filePath, 'path');
    const content = this.files.get(normalizeRelativePath(filePath));
    if (content === undefined) {
      throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }
    return content;
  }

  /**
   * [EARS-FL04] Gets file statistics.
   * [EARS-MFL03] Generates stats from content when not provided.
   */
  async stat(filePath: string): Promise<FileStats> {
    assertProjectPath(filePath, 'path');
    const normalized = normalizeRelativePath(filePath);
    const content = this.files.get(normalized);

    if (content === undefined) {
      if (this.isDirectory(normalized)) {
        return { size: 0, mtime: 0, isFile: false };
      }
      throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }

    return this.stats.get(normalized) ?? {
      size: Buffer.byteLength(content, 'utf-8'),
      mtime: 0,
      isFile: true,
    };
  }

  /**
   * [EARS-MFL04] Adds or replaces a file.
   */
  addFile(filePath: string, content: string): void {
    this.files.set(normalizeRelativePath(filePath), content);
  }

  removeFile(filePath: string): boolean {
    const normalized = normalizeRelativePath(filePath);
    this.stats.delete(normalized);
    return this.files.delete(normalized);
  }

  listPaths(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  clear(): void {
    this.files.clear();
    this.stats.clear();
  }

  private isDirectory(normalized: string): boolean {
    if (normalized === '' || normalized === '.') return this.files.size > 0;
    const prefix = `${normalized}/`;
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }
}
