export { TransitionRunner } from './transition_runner';
export { TransitionNotFoundError } from './transition_runner.errors';
export type {
  AttemptOptions,
  AttemptResult,
  TaskOptions,
  TransitionRunnerDependencies,
} from './transition_runner.types';
