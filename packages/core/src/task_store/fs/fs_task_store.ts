import * as fs from 'fs/promises';
import * as path from 'path';
import { isErrnoException } from '../../errors';
import { createLogger } from '../../logger';
import type { StateName, Task } from '../../workflow_model';
import { parseTaskFile, updateTaskStatus } from '../task_file';
import type { FsTaskStoreOptions, TaskStore } from '../task_store';
import { TaskNotFoundError } from '../task_store';

const logger = createLogger('[TaskStore] ');

/**
 * Blocks `..`, `/` and `\` so an id never leaves the tasks directory.
 */
function validateId(taskId: string): void {
  if (!taskId.trim()) {
    throw new Error('Task id must be a non-empty string');
  }
  if (taskId.includes('..') || /[/\\]/.test(taskId)) {
    throw new Error(`Invalid task id: "${taskId}". Ids cannot contain /, \\, or ..`);
  }
}

function idFromFileName(fileName: string): string {
  const stem = fileName.replace(/\.md$/i, '');
  const separator = stem.indexOf(' - ');
  return separator === -1 ? stem : stem.slice(0, separator);
}

/**
 * FsTaskStore - Markdown task files with YAML front matter.
 *
 * A task lives in `<id>.md` or `<id> - <title>.md`. Writing a state only
 * touches the `status` field of the front matter.
 *
 * @example
 * const store = new FsTaskStore({ tasksDir: 'backlog/tasks' });
 * const task = await store.getTask('task-42');
 */
export class FsTaskStore implements TaskStore {
  private readonly tasksDir: string;

  constructor(options: FsTaskStoreOptions) {
    this.tasksDir = path.resolve(options.tasksDir);
  }

  async getTask(taskId: string): Promise<Task | null> {
    const filePath = await this.findTaskFile(taskId);
    if (!filePath) return null;

    const content = await fs.readFile(filePath, 'utf-8');
    return parseTaskFile(content, filePath, taskId).task;
  }

  async setState(taskId: string, state: StateName): Promise<void> {
    const filePath = await this.findTaskFile(taskId);
    if (!filePath) {
      throw new TaskNotFoundError(taskId);
    }

    const content = await fs.readFile(filePath, 'utf-8');
    await fs.writeFile(filePath, updateTaskStatus(content, state, filePath), 'utf-8');
    logger.debug(`Task ${taskId} moved to '${state}'`);
  }

  async listTasks(): Promise<Task[]> {
    const tasks: Task[] = [];
    for (const fileName of await this.taskFileNames()) {
      const filePath = path.join(this.tasksDir, fileName);
      const content = await fs.readFile(filePath, 'utf-8');
      tasks.push(parseTaskFile(content, filePath, idFromFileName(fileName)).task);
    }
    return tasks;
  }

  private async findTaskFile(taskId: string): Promise<string | null> {
    validateId(taskId);
    const wanted = taskId.toLowerCase();

    const fileName = (await this.taskFileNames()).find(name => idFromFileName(name).toLowerCase() === wanted);
    return fileName ? path.join(this.tasksDir, fileName) : null;
  }

  private async taskFileNames(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.tasksDir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile() && /\.md$/i.test(entry.name))
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
