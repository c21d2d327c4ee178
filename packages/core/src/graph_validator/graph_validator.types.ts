import type { StateName } from '../workflow_model';

export type GraphIssueSeverity = 'error' | 'warning';

export type GraphErrorCode =
  | 'CYCLE_DETECTED'
  | 'UNDEFINED_FROM_STATE'
  | 'UNDEFINED_TO_STATE'
  | 'UNDEFINED_WORKFLOW_REFERENCE'
  | 'UNDEFINED_INITIAL_STATE'
  | 'NO_INITIAL_STATE'
  | 'NO_TERMINAL_STATE';

export type GraphWarningCode =
  | 'UNREACHABLE_STATE'
  | 'UNKNOWN_AGENT'
  | 'UNKNOWN_AGENT_IN_LOOP'
  | 'UNUSED_WORKFLOW';

export type GraphIssueCode = GraphErrorCode | GraphWarningCode;

export type GraphIssue = {
  severity: GraphIssueSeverity;
  code: GraphIssueCode;
  message: string;
  /** States involved; for cycles the full path with the start repeated at the end */
  states: StateName[];
  /** Index of the offending transition in declaration order */
  transitionIndex?: number;
  workflow?: string;
  agent?: string;
};

/**
 * Result of validating a Configuration's graph. Errors block use of the
 * configuration; warnings are advisory.
 */
export type ValidationReport = {
  isValid: boolean;
  errors: GraphIssue[];
  warnings: GraphIssue[];
};

export type GraphValidatorOptions = {
  /** Agent names accepted on top of the bundled list and the document's own */
  knownAgents?: readonly string[];
  /** Replace the bundled agent list instead of extending it */
  replaceBundledAgents?: boolean;
};

/**
 * Adjacency list over declared states, neighbours in transition
 * declaration order.
 */
export type TransitionGraph = ReadonlyMap<StateName, readonly StateName[]>;
