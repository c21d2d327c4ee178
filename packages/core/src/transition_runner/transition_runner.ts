import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { TaskNotFoundError } from '../task_store';
import type { TaskStore } from '../task_store';
import { GateFailure } from '../validation_engine';
import type { ValidationEngine } from '../validation_engine';
import { nextOptionsWithCommands, resolveTransition, transitionsForWorkflow } from '../workflow_assessor';
import type { Configuration, Task } from '../workflow_model';
import { TransitionNotFoundError } from './transition_runner.errors';
import type {
  AttemptOptions,
  AttemptResult,
  TaskOptions,
  TransitionRunnerDependencies,
} from './transition_runner.types';

/**
 * Moves stored tasks along the workflow: load, resolve the command,
 * evaluate the gate, persist the proposed state.
 */
export class TransitionRunner {
  private readonly configuration: Configuration;
  private readonly taskStore: TaskStore;
  private readonly engine: ValidationEngine;
  private readonly logger: Logger;

  constructor(dependencies: TransitionRunnerDependencies) {
    this.configuration = dependencies.configuration;
    this.taskStore = dependencies.taskStore;
    this.engine = dependencies.engine;
    this.logger = dependencies.logger ?? createLogger('[TransitionRunner] ');
  }

  /**
   * @throws TaskNotFoundError
   */
  async nextOptions(taskId: string): Promise<TaskOptions> {
    const task = await this.loadTask(taskId);
    return { task, options: nextOptionsWithCommands(task.currentState, this.configuration) };
  }

  /**
   * A command unknown in the task's current state is still evaluated
   * against the workflow's first transition, so the caller gets the
   * INVALID_SOURCE_STATE reason instead of a lookup failure.
   *
   * @throws TaskNotFoundError, TransitionNotFoundError, GateFailure
   */
  async attempt(taskId: string, via: string, options: AttemptOptions = {}): Promise<AttemptResult> {
    const task = await this.loadTask(taskId);
    const transition = resolveTransition(this.configuration, task.currentState, via)
      ?? transitionsForWorkflow(this.configuration, via)[0];

    if (!transition) {
      const available = nextOptionsWithCommands(task.currentState, this.configuration).map(option => option.command);
      throw new TransitionNotFoundError(via, task.currentState, available);
    }

    const result = await this.engine.evaluate({
      task,
      transition,
      artifactContext: options.artifactContext,
      approvalKeyword: options.approvalKeyword,
      pullRequest: options.pullRequest,
      skipValidation: options.skipValidation,
    });

    if (!result.allowed || result.proposedState === null) {
      throw new GateFailure(result);
    }

    if (options.dryRun) {
      this.logger.info(`Dry run: task ${task.id} would move to '${result.proposedState}'`);
      return { task, result, persisted: false };
    }

    await this.taskStore.setState(task.id, result.proposedState);
    this.logger.info(`Task ${task.id} moved from '${task.currentState}' to '${result.proposedState}'`);
    return { task, result, persisted: true };
  }

  private async loadTask(taskId: string): Promise<Task> {
    const task = await this.taskStore.getTask(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }
}
