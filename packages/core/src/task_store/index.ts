export { TaskFileError, TaskNotFoundError } from './task_store';
export type { FsTaskStoreOptions, MemoryTaskStoreOptions, ParsedTaskFile, TaskStore } from './task_store';
export { parseTaskFile, updateTaskStatus } from './task_file';
