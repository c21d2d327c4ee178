import type { Configuration, StateName, Transition, WorkflowDefinition } from '../workflow_model';
import type { NextOption, StateCheckResponse } from './workflow_assessor.types';

function normalizeState(state: string): string {
  return state.trim().toLowerCase();
}

function startsFrom(transition: Transition, state: StateName): boolean {
  const wanted = normalizeState(state);
  return transition.from.some(from => normalizeState(from) === wanted);
}

function commandOf(config: Configuration, workflowName: string): string {
  return config.workflows.find(workflow => workflow.name === workflowName)?.command ?? workflowName;
}

/**
 * Transitions leaving `state`, in declaration order.
 */
export function nextOptions(state: StateName, config: Configuration): Transition[] {
  return config.transitions.filter(transition => transition.from.includes(state));
}

export function nextOptionsWithCommands(state: StateName, config: Configuration): NextOption[] {
  return nextOptions(state, config).map(transition => ({
    transition,
    command: commandOf(config, transition.via),
  }));
}

function workflowNameFor(config: Configuration, via: string): string {
  return config.workflows.find(workflow => workflow.command === via)?.name ?? via;
}

/**
 * Every transition a workflow performs, from any state. `via` matches
 * either the workflow name or its command.
 */
export function transitionsForWorkflow(config: Configuration, via: string): Transition[] {
  const workflowName = workflowNameFor(config, via);
  return config.transitions.filter(transition => transition.via === workflowName);
}

/**
 * The transition a workflow performs from `state`.
 */
export function resolveTransition(config: Configuration, state: StateName, via: string): Transition | null {
  const workflowName = workflowNameFor(config, via);
  return nextOptions(state, config).find(transition => transition.via === workflowName) ?? null;
}

export function isValidTransition(config: Configuration, from: StateName, to: StateName): boolean {
  return getWorkflowForTransition(config, from, to) !== null;
}

/**
 * Workflow performing the first transition from `from` to `to`.
 */
export function getWorkflowForTransition(config: Configuration, from: StateName, to: StateName): WorkflowDefinition | null {
  const transition = nextOptions(from, config).find(candidate => candidate.to === to);
  if (!transition) return null;
  return config.workflows.find(workflow => workflow.name === transition.via) ?? null;
}

/**
 * Commands of every workflow with a transition leaving `state`, sorted.
 */
export function validWorkflowsForState(config: Configuration, state: StateName): string[] {
  const commands = new Set<string>();
  for (const transition of config.transitions) {
    if (startsFrom(transition, state)) {
      commands.add(commandOf(config, transition.via));
    }
  }
  return Array.from(commands).sort();
}

function blockedMessage(response: Omit<StateCheckResponse, 'message'>, command: string): string {
  const lines = [
    `Cannot run ${command}`,
    '',
    `  Current state: "${response.currentState}"`,
    `  Required states: ${response.requiredStates.join(', ') || 'none'}`,
    '',
    'Suggestions:',
  ];
  if (response.suggestedWorkflows.length) {
    lines.push(`  - Valid workflows for '${response.currentState}': ${response.suggestedWorkflows.join(', ')}`);
  } else {
    lines.push(`  - No workflows available for state '${response.currentState}'`);
  }
  lines.push('  - Check if the task needs a status update first');
  return lines.join('\n');
}

/**
 * State guard for running a workflow by name. State comparison trims and
 * ignores case.
 */
export function checkWorkflowState(config: Configuration, workflowName: string, currentState: StateName): StateCheckResponse {
  const workflow = config.workflows.find(candidate =>
    normalizeState(candidate.name) === normalizeState(workflowName)
  );

  if (!workflow) {
    return {
      result: 'UNKNOWN_WORKFLOW',
      workflow: workflowName,
      currentState,
      requiredStates: [],
      nextState: null,
      suggestedWorkflows: validWorkflowsForState(config, currentState),
      message: `Unknown workflow '${workflowName}'`,
    };
  }

  const transitions = config.transitions.filter(transition => transition.via === workflow.name);
  const requiredStates = Array.from(new Set(transitions.flatMap(transition => transition.from)));
  const match = transitions.find(transition => startsFrom(transition, currentState));

  if (match) {
    return {
      result: 'ALLOWED',
      workflow: workflow.name,
      currentState,
      requiredStates,
      nextState: match.to,
      suggestedWorkflows: [],
      message: `State '${currentState}' is valid for ${workflow.command}`,
    };
  }

  const blocked = {
    result: 'BLOCKED' as const,
    workflow: workflow.name,
    currentState,
    requiredStates,
    nextState: null,
    suggestedWorkflows: validWorkflowsForState(config, currentState),
  };
  return { ...blocked, message: blockedMessage(blocked, workflow.command) };
}
