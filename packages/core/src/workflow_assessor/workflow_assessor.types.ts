import type { StateName, Transition } from '../workflow_model';

export type StateCheckResult = 'ALLOWED' | 'BLOCKED' | 'UNKNOWN_WORKFLOW';

/**
 * Answer of the state guard: may `workflow` run while a task sits in
 * `currentState`?
 */
export type StateCheckResponse = {
  result: StateCheckResult;
  workflow: string;
  currentState: StateName;
  /** States the workflow's transitions start from, in declaration order */
  requiredStates: StateName[];
  /** Destination when allowed */
  nextState: StateName | null;
  /** Commands of the workflows the current state does allow */
  suggestedWorkflows: string[];
  message: string;
};

/**
 * One legal move out of a state.
 */
export type NextOption = {
  transition: Transition;
  command: string;
};
