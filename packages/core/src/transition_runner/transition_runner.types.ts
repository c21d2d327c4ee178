import type { Logger } from '../logger';
import type { TaskStore } from '../task_store';
import type { GateResult, PullRequestStatus, ValidationEngine } from '../validation_engine';
import type { NextOption } from '../workflow_assessor';
import type { ArtifactContext, Configuration, Task } from '../workflow_model';

export type TransitionRunnerDependencies = {
  configuration: Configuration;
  taskStore: TaskStore;
  engine: ValidationEngine;
  logger?: Logger;
};

export type AttemptOptions = {
  approvalKeyword?: string;
  pullRequest?: PullRequestStatus;
  artifactContext?: ArtifactContext;
  skipValidation?: boolean;
  /** Evaluate without writing the new state */
  dryRun?: boolean;
};

export type AttemptResult = {
  task: Task;
  result: GateResult;
  /** The store now holds the proposed state */
  persisted: boolean;
};

export type TaskOptions = {
  task: Task;
  options: NextOption[];
};
