/**
 * Standard Command Interface for the flowgate CLI
 *
 * Every command implements this so it can be registered the same way and
 * tested with a mocked dependency service.
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}
