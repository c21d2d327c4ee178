import type { StateName, Task } from '../../workflow_model';
import type { MemoryTaskStoreOptions, TaskStore } from '../task_store';
import { TaskNotFoundError } from '../task_store';

/**
 * MemoryTaskStore - Map-backed TaskStore for tests and embedding.
 *
 * @example
 * const store = new MemoryTaskStore({ tasks: [task] });
 * await store.setState(task.id, 'Done');
 * expect((await store.getTask(task.id))?.currentState).toBe('Done');
 */
export class MemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, Task>();

  constructor(options: MemoryTaskStoreOptions = {}) {
    for (const task of options.tasks ?? []) {
      this.tasks.set(task.id, task);
    }
  }

  async getTask(taskId: string): Promise<Task | null> {
    return this.tasks.get(taskId) ?? null;
  }

  async setState(taskId: string, state: StateName): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    this.tasks.set(taskId, { ...task, currentState: state });
  }

  async listTasks(): Promise<Task[]> {
    return Array.from(this.tasks.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  put(task: Task): void {
    this.tasks.set(task.id, task);
  }

  size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
  }
}
