/**
 * Base Command Class for the flowgate CLI
 *
 * Shared output handling: text or `--json`, and the exit code contract
 * (0 success, 1 failure).
 */

import { Command } from 'commander';
import { Errors } from '@flowgate/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

export type FailureDetails = {
  /** Underlying error; its stack is shown with --verbose */
  error?: unknown;
  /** Extra lines printed under the message in text mode */
  details?: string[];
  /** Payload included in the JSON output */
  data?: unknown;
  exitCode?: number;
};

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly container = DependencyInjectionService.getInstance();
  protected readonly logger = console;

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, failure: FailureDetails = {}): void {
    const exitCode = failure.exitCode ?? 1;
    const error = failure.error;

    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(Errors.isFlowgateError(error) && { code: error.code }),
        ...(failure.data !== undefined && { data: failure.data }),
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      for (const line of failure.details ?? []) {
        console.error(line);
      }
      if (options.verbose && error instanceof Error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, lines: string[] = []): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }

    if (options.quiet) {
      return;
    }
    if (message) {
      console.log(`✅ ${message}`);
    }
    for (const line of lines) {
      console.log(line);
    }
  }

  /**
   * Wraps an unexpected failure with the command name
   */
  protected handleUnexpected(action: string, error: unknown, options: TOptions): void {
    this.handleError(`Failed to ${action}: ${Errors.errorMessage(error)}`, options, { error });
  }
}
