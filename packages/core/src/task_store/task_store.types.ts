import type { Task } from '../workflow_model';

export type FsTaskStoreOptions = {
  /** Directory holding one Markdown file per task */
  tasksDir: string;
};

export type MemoryTaskStoreOptions = {
  tasks?: Task[];
};

/**
 * A task file split into its parts.
 */
export type ParsedTaskFile = {
  task: Task;
  frontMatter: Record<string, unknown>;
  body: string;
};
