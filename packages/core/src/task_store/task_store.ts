import type { StateName, Task } from '../workflow_model';

export { TaskFileError, TaskNotFoundError } from './task_store.errors';
export type { FsTaskStoreOptions, MemoryTaskStoreOptions, ParsedTaskFile } from './task_store.types';

/**
 * Access to the externally owned task records. The engine reads snapshots
 * and only ever writes a task's state, after a gate allowed it.
 */
export interface TaskStore {
  /**
   * @returns null when no task has this id
   */
  getTask(taskId: string): Promise<Task | null>;

  /**
   * @throws TaskNotFoundError
   */
  setState(taskId: string, state: StateName): Promise<void>;

  listTasks(): Promise<Task[]>;
}
