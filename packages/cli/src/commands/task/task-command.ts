import { Command } from 'commander';
import { AcCoverage, Errors, TaskStore, ValidationEngine, WorkflowAssessor, WorkflowModel } from '@flowgate/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface TaskListOptions extends BaseCommandOptions {
  state?: string;
}

export type TaskNextOptions = BaseCommandOptions;

export type TaskCheckOptions = BaseCommandOptions;

export interface TaskTransitionOptions extends BaseCommandOptions {
  keyword?: string;
  prMerged?: boolean;
  prNumber?: number;
  feature?: string;
  dryRun?: boolean;
  skipValidation?: boolean;
}

export interface TaskCoverageOptions extends BaseCommandOptions {
  requireFull?: boolean;
}

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

export function formatReason(reason: ValidationEngine.GateReason): string[] {
  const marker = reason.severity === 'fatal' ? '-' : '⚠️ ';
  return [
    `  ${marker} [${reason.code}] ${reason.message}`,
    ...(reason.details ?? []).map(detail => `      ${detail}`),
  ];
}

/**
 * Task Command - moves tasks through the configured lifecycle.
 *
 * Thin wrapper: state lookups go through the assessor, every gate through
 * the TransitionRunner.
 */
export class TaskCommand extends BaseCommand {
  register(program: Command): void {
    const task = program
      .command('task')
      .description('Inspect and transition tasks')
      .addHelpText('after', `
EXAMPLES:
  flowgate task next task-42
  flowgate task check task-42 specify
  flowgate task transition task-42 /flow:specify --feature user-auth
  flowgate task transition task-42 /flow:validate --keyword APPROVED
  flowgate task coverage task-42 --require-full
`);

    task
      .command('list')
      .description('List tasks with their state and acceptance-criteria coverage')
      .option('-s, --state <state>', 'Only tasks in this state')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (options: TaskListOptions) => {
        await this.executeList(options);
      });

    task
      .command('next <taskId>')
      .description('List the transitions available from the task\'s current state')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (taskId: string, options: TaskNextOptions) => {
        await this.executeNext(taskId, options);
      });

    task
      .command('check <taskId> <workflow>')
      .description('Check whether a workflow may run from the task\'s current state')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (taskId: string, workflow: string, options: TaskCheckOptions) => {
        await this.executeCheck(taskId, workflow, options);
      });

    task
      .command('transition <taskId> <command>')
      .description('Evaluate the gate for a workflow command and move the task when it passes')
      .option('-k, --keyword <keyword>', 'Approval keyword for KEYWORD gates')
      .option('--pr-merged', 'The pull request for this change is merged')
      .option('--pr-number <number>', 'Pull request number, for messages', parseInteger)
      .option('--feature <name>', 'Feature name substituted into artifact paths (default: task metadata)')
      .option('--dry-run', 'Evaluate the gate without writing the new state')
      .option('--skip-validation', 'Bypass artifact and approval gates (emergency override)')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (taskId: string, command: string, options: TaskTransitionOptions) => {
        await this.executeTransition(taskId, command, options);
      });

    task
      .command('coverage <taskId>')
      .description('Report acceptance-criteria coverage')
      .option('--require-full', 'Exit with code 1 unless every criterion is checked')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (taskId: string, options: TaskCoverageOptions) => {
        await this.executeCoverage(taskId, options);
      });
  }

  async executeList(options: TaskListOptions): Promise<void> {
    try {
      const wanted = options.state?.trim().toLowerCase();
      const tasks = (await this.container.getTaskStore().listTasks())
        .filter(task => wanted === undefined || task.currentState.toLowerCase() === wanted);

      const data = tasks.map(task => ({
        id: task.id,
        state: task.currentState,
        coverage: AcCoverage.coverage(task),
      }));
      const lines = data.map(entry =>
        `  ${entry.id}  ${entry.state}  ${entry.coverage.checked}/${entry.coverage.total}`
      );

      this.handleSuccess(data, options, `${tasks.length} task(s)`, lines);
    } catch (error) {
      this.handleFailure('list tasks', error, options);
    }
  }

  async executeNext(taskId: string, options: TaskNextOptions): Promise<void> {
    try {
      const runner = await this.container.getTransitionRunner();
      const { task, options: next } = await runner.nextOptions(taskId);

      const data = {
        taskId: task.id,
        currentState: task.currentState,
        options: next.map(option => ({
          command: option.command,
          workflow: option.transition.via,
          to: option.transition.to,
          validation: WorkflowModel.formatValidationMode(option.transition.validationMode),
        })),
      };
      const lines = next.length
        ? next.map(option =>
          `  ${option.command} → ${option.transition.to} (${WorkflowModel.describeValidationMode(option.transition.validationMode)})`
        )
        : [`  No transitions leave '${task.currentState}'`];

      this.handleSuccess(data, options, `Task ${task.id} is in '${task.currentState}'`, lines);
    } catch (error) {
      this.handleFailure('list next transitions', error, options);
    }
  }

  /**
   * Exit code 1 when the workflow is blocked or unknown.
   */
  async executeCheck(taskId: string, workflow: string, options: TaskCheckOptions): Promise<void> {
    try {
      const { configuration } = await this.container.getConfiguration();
      const task = await this.container.getTaskStore().getTask(taskId);
      if (!task) {
        throw new TaskStore.TaskNotFoundError(taskId);
      }

      const response = WorkflowAssessor.checkWorkflowState(configuration, workflow, task.currentState);
      if (response.result !== 'ALLOWED') {
        const [headline = response.message, ...rest] = response.message.split('\n');
        this.handleError(headline, options, { details: rest, data: response });
        return;
      }

      this.handleSuccess(response, options, response.message, [
        `  Next state: ${response.nextState ?? 'none'}`,
      ]);
    } catch (error) {
      this.handleFailure('check workflow state', error, options);
    }
  }

  async executeTransition(taskId: string, command: string, options: TaskTransitionOptions): Promise<void> {
    if (options.prNumber !== undefined && Number.isNaN(options.prNumber)) {
      this.handleError('--pr-number must be an integer', options);
      return;
    }

    try {
      const runner = await this.container.getTransitionRunner();
      const pullRequest = options.prMerged || options.prNumber !== undefined
        ? {
          merged: options.prMerged ?? false,
          ...(options.prNumber !== undefined && { number: options.prNumber }),
        }
        : undefined;

      const outcome = await runner.attempt(taskId, command, {
        ...(options.keyword !== undefined && { approvalKeyword: options.keyword }),
        ...(pullRequest && { pullRequest }),
        ...(options.feature !== undefined && { artifactContext: { feature: options.feature } }),
        skipValidation: options.skipValidation ?? false,
        dryRun: options.dryRun ?? false,
      });

      const { result } = outcome;
      const data = {
        taskId: result.taskId,
        transition: result.transition.name,
        from: result.fromState,
        to: result.proposedState,
        persisted: outcome.persisted,
        skipped: result.skipped,
        reasons: result.reasons,
      };
      const message = outcome.persisted
        ? `Task ${result.taskId} moved from '${result.fromState}' to '${result.proposedState}'`
        : `Task ${result.taskId} can move from '${result.fromState}' to '${result.proposedState}' (dry run, nothing written)`;
      const lines = [
        ...(result.skipped ? ['  ⚠️  Validation skipped'] : []),
        ...result.reasons.flatMap(formatReason),
      ];

      this.handleSuccess(data, options, message, lines);
    } catch (error) {
      if (error instanceof ValidationEngine.GateFailure) {
        this.handleError(
          `Transition '${error.result.transition.name}' denied for task ${error.result.taskId}`,
          options,
          { error, details: error.result.reasons.flatMap(formatReason), data: error.result }
        );
        return;
      }
      this.handleFailure('transition task', error, options);
    }
  }

  async executeCoverage(taskId: string, options: TaskCoverageOptions): Promise<void> {
    try {
      const task = await this.container.getTaskStore().getTask(taskId);
      if (!task) {
        throw new TaskStore.TaskNotFoundError(taskId);
      }

      const report = AcCoverage.coverage(task);
      const unchecked = AcCoverage.uncheckedCriteria(task);
      const data = { taskId: task.id, ...report, unchecked };
      const summary = `Task ${task.id}: ${AcCoverage.formatCoverage(report)}`;
      const lines = unchecked.map(criterion => `  [ ] #${criterion.index} ${criterion.text}`);

      if (options.requireFull && !AcCoverage.isFullyCovered(task)) {
        this.handleError(summary, options, { details: lines, data });
        return;
      }
      this.handleSuccess(data, options, summary, lines);
    } catch (error) {
      this.handleFailure('read task coverage', error, options);
    }
  }

  /**
   * Engine errors already read well on their own; anything else gets the
   * action prefix.
   */
  private handleFailure(action: string, error: unknown, options: BaseCommandOptions): void {
    if (Errors.isFlowgateError(error)) {
      this.handleError(error.message, options, { error });
      return;
    }
    this.handleUnexpected(action, error, options);
  }
}
