export { assertProjectPath, FileListerError, normalizeRelativePath } from './file_lister';
export type {
  FileLister,
  FileListerErrorCode,
  FileListOptions,
  FileStats,
  FsFileListerOptions,
  MemoryFileListerOptions,
} from './file_lister';
