import type { Task } from '../../workflow_model';
import { TaskNotFoundError } from '../task_store';
import { MemoryTaskStore } from './memory_task_store';

const task: Task = { id: 'task-1', currentState: 'To Do', acceptanceCriteria: [], metadata: {} };

describe('MemoryTaskStore', () => {
  it('[EARS-MTS01] should return stored tasks and null for unknown ids', async () => {
    const store = new MemoryTaskStore({ tasks: [task] });

    expect(await store.getTask('task-1')).toBe(task);
    expect(await store.getTask('task-2')).toBeNull();
  });

  it('[EARS-MTS02] should replace the state without mutating the snapshot', async () => {
    const store = new MemoryTaskStore({ tasks: [task] });

    await store.setState('task-1', 'Done');

    expect((await store.getTask('task-1'))?.currentState).toBe('Done');
    expect(task.currentState).toBe('To Do');
  });

  it('[EARS-MTS03] should throw TaskNotFoundError for unknown ids', async () => {
    await expect(new MemoryTaskStore().setState('task-9', 'Done')).rejects.toThrow(TaskNotFoundError);
  });

  it('[EARS-MTS04] should list tasks by id', async () => {
    const store = new MemoryTaskStore();
    store.put({ ...task, id: 'task-b' });
    store.put({ ...task, id: 'task-a' });

    expect((await store.listTasks()).map(item => item.id)).toEqual(['task-a', 'task-b']);
    expect(store.size()).toBe(2);
    store.clear();
    expect(store.size()).toBe(0);
  });
});
