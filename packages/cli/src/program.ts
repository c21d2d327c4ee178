import { Command } from 'commander';
import { registerArtifactCommands } from './commands/artifact/artifact';
import { registerConfigCommands } from './commands/config/config';
import { registerTaskCommands } from './commands/task/task';
import { DEFAULT_TASKS_DIR, DependencyInjectionService } from './services/dependency-injection';

export const CLI_VERSION = '0.1.0';

/**
 * Builds the flowgate program. The global --config and --tasks-dir flags
 * are handed to the dependency service before any action runs.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('flowgate')
    .description('Configuration-driven workflow gates for tasks, artifacts and approvals')
    .version(CLI_VERSION)
    .option('-c, --config <path>', 'Workflow document (default: FLOWGATE_CONFIG, then discovery from the current directory)')
    .option('--tasks-dir <dir>', `Directory of task files (default: ${DEFAULT_TASKS_DIR} under the project root)`);

  program.hook('preAction', (_program, actionCommand) => {
    const globals = actionCommand.optsWithGlobals();
    const configPath: unknown = globals['config'];
    const tasksDir: unknown = globals['tasksDir'];

    DependencyInjectionService.getInstance().configure({
      ...(typeof configPath === 'string' && { configPath }),
      ...(typeof tasksDir === 'string' && { tasksDir }),
    });
  });

  registerConfigCommands(program);
  registerTaskCommands(program);
  registerArtifactCommands(program);

  return program;
}
