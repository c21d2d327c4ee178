/**
 * FileLister Interface
 *
 * Read-only view of the project tree. The validation engine checks artifact
 * existence and reads artifact content through it, so gates can be
 * evaluated against the real filesystem or an in-memory tree.
 *
 * @module file_lister
 */

import * as path from 'path';
import { FileListerError } from './file_lister.errors';
import type { FileListOptions, FileStats } from './file_lister.types';

export type { FileListOptions, FileStats, FsFileListerOptions, MemoryFileListerOptions } from './file_lister.types';
export { FileListerError } from './file_lister.errors';
export type { FileListerErrorCode } from './file_lister.errors';

/**
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 *
 * // Memory backend (tests)
 * const lister = new MemoryFileLister({ files: { 'docs/prd/auth.md': '# Auth' } });
 *
 * const prds = await lister.list(['docs/prd/*.md']);
 * const content = await lister.read('docs/prd/auth.md');
 * ```
 */
export interface FileLister {
  /**
   * [EARS-FL01] Lists files matching glob patterns.
   * @returns Paths relative to the lister root
   */
  list(patterns: string[], options?: FileListOptions): Promise<string[]>;

  /**
   * [EARS-FL02] Checks if a file or directory exists.
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * [EARS-FL03] Reads file content as UTF-8.
   * @throws FileListerError if the file doesn't exist or can't be read
   */
  read(filePath: string): Promise<string>;

  /**
   * [EARS-FL04] Gets file statistics.
   * @throws FileListerError if the file doesn't exist
   */
  stat(filePath: string): Promise<FileStats>;
}

/**
 * Strips a leading `./` and any trailing slash so paths from
 * configuration documents compare equal to listed paths.
 */
export function normalizeRelativePath(filePath: string): string {
  let normalized = filePath.replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized.replace(/\/+$/, '');
}

/**
 * Rejects `..` segments and absolute paths so nothing escapes the project
 * root. Both listers apply it to every path and pattern they are given.
 */
export function assertProjectPath(filePath: string, kind: 'path' | 'pattern'): void {
  if (filePath.split(/[\\/]/).includes('..')) {
    throw new FileListerError(
      `Invalid ${kind}: path traversal not allowed: ${filePath}`,
      'INVALID_PATH',
      filePath
    );
  }
  if (path.isAbsolute(filePath)) {
    throw new FileListerError(
      `Invalid ${kind}: absolute paths not allowed: ${filePath}`,
      'INVALID_PATH',
      filePath
    );
  }
}
