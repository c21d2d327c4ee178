import { FlowgateError } from '../errors';

export class TaskNotFoundError extends FlowgateError {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND');
  }
}

/**
 * A task file exists but cannot be read as a task.
 */
export class TaskFileError extends FlowgateError {
  constructor(message: string, public readonly filePath: string) {
    super(`${filePath}: ${message}`, 'TASK_FILE_INVALID');
  }
}
