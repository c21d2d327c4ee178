/**
 * Options for file listing.
 */
export type FileListOptions = {
  /** Glob patterns to ignore (e.g., ['node_modules/**']) */
  ignore?: string[];
  /** Only return files (not directories). Default: true */
  onlyFiles?: boolean;
  /** Maximum depth to traverse. Default: unlimited */
  maxDepth?: number;
};

/**
 * File statistics returned by stat().
 */
export type FileStats = {
  /** Size in bytes */
  size: number;
  /** Last modification time (ms since epoch) */
  mtime: number;
  isFile: boolean;
};

export type FsFileListerOptions = {
  /** Base directory every relative path resolves against */
  cwd: string;
};

export type MemoryFileListerOptions = {
  /** filePath -> content */
  files?: Map<string, string> | Record<string, string>;
  /** filePath -> stats, generated from content when absent */
  stats?: Map<string, FileStats>;
};
