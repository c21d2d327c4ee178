export {
  BUNDLED_KNOWN_AGENTS,
  GraphValidator,
  buildTransitionGraph,
  findCycles,
  findUnreachableStates,
  initialStatesOf,
  isTerminalState,
  terminalStatesOf,
} from './graph_validator';
export { GraphError } from './graph_validator.errors';
export type {
  GraphErrorCode,
  GraphIssue,
  GraphIssueCode,
  GraphIssueSeverity,
  GraphValidatorOptions,
  GraphWarningCode,
  TransitionGraph,
  ValidationReport,
} from './graph_validator.types';
