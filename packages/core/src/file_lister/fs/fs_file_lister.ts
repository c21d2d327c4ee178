/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for file operations.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister, FileListOptions, FileStats, FsFileListerOptions } from '../file_lister';
import { assertProjectPath, FileListerError, normalizeRelativePath } from '../file_lister';
import { errorMessage, isErrnoException } from '../../errors';

/**
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: process.cwd() });
 * const adrs = await lister.list(['docs/adr/ADR-*.md']);
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
  }

  /**
   * [EARS-FL01] Lists files matching glob patterns.
   * [EARS-FFL01] Excludes files matching ignore patterns.
   */
  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    // [EARS-FFL04] [EARS-FFL05] no traversal, no absolute patterns
    for (const pattern of patterns) {
      assertProjectPath(pattern, 'pattern');
    }

    const fgOptions: Parameters<typeof fg>[1] = {
      cwd: this.cwd,
      ignore: options?.ignore ?? [],
      onlyFiles: options?.onlyFiles ?? true,
      dot: true,
    };

    if (options?.maxDepth !== undefined) {
      fgOptions.deep = options.maxDepth;
    }

    const matches = await fg(patterns.map(normalizeRelativePath), fgOptions);
    return matches.sort();
  }

  /**
   * [EARS-FL02] Checks if a file or directory exists.
   */
  async exists(filePath: string): Promise<boolean> {
    assertProjectPath(filePath, 'path');

    try {
      await fs.access(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * [EARS-FL03] Reads file content as string.
   * [EARS-FFL03] Throws FILE_NOT_FOUND for missing files.
   */
  async read(filePath: string): Promise<string> {
    assertProjectPath(filePath, 'path');

    try {
      return await fs.readFile(this.resolve(filePath), 'utf-8');
    } catch (error: unknown) {
      throw this.toListerError(error, filePath, 'Read');
    }
  }

  /**
   * [EARS-FL04] Gets file statistics.
   */
  async stat(filePath: string): Promise<FileStats> {
    assertProjectPath(filePath, 'path');

    try {
      const stats = await fs.stat(this.resolve(filePath));
      return {
        size: stats.size,
        mtime: stats.mtimeMs,
        isFile: stats.isFile(),
      };
    } catch (error: unknown) {
      throw this.toListerError(error, filePath, 'Stat');
    }
  }

  private resolve(filePath: string): string {
    return path.join(this.cwd, normalizeRelativePath(filePath));
  }

  private toListerError(error: unknown, filePath: string, operation: string): FileListerError {
    if (isErrnoException(error)) {
      if (error.code === 'ENOENT') {
        return new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      }
      if (error.code === 'EACCES') {
        return new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      }
    }
    return new FileListerError(`${operation} error: ${errorMessage(error)}`, 'READ_ERROR', filePath);
  }
}
