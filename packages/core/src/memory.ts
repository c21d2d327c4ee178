/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the engine where the project tree
 * or the task records live elsewhere.
 */

// FileLister
export { MemoryFileLister } from './file_lister/memory';
export type { MemoryFileListerOptions } from './file_lister/memory';

// TaskStore
export { MemoryTaskStore } from './task_store/memory';
export type { MemoryTaskStoreOptions } from './task_store';
