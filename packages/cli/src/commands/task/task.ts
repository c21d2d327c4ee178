import { Command } from 'commander';
import { TaskCommand } from './task-command';

/**
 * Register the task commands
 */
export function registerTaskCommands(program: Command): void {
  const taskCommand = new TaskCommand();
  taskCommand.register(program);
}
