import { Command } from 'commander';
import { ConfigCommand } from './config-command';

/**
 * Register the config commands
 */
export function registerConfigCommands(program: Command): void {
  const configCommand = new ConfigCommand();
  configCommand.register(program);
}
