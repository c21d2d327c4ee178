import { createLogger } from '../logger';
import type { Configuration, StateName } from '../workflow_model';
import bundledAgents from './known_agents.json';
import { GraphError } from './graph_validator.errors';
import type {
  GraphIssue,
  GraphValidatorOptions,
  TransitionGraph,
  ValidationReport,
} from './graph_validator.types';

const logger = createLogger('[GraphValidator] ');

export const BUNDLED_KNOWN_AGENTS: readonly string[] = Object.freeze([...bundledAgents]);

/**
 * Builds the adjacency list: one edge from each `from` member to `to`.
 * Edges touching undeclared states are left out; those are reported as
 * reference errors instead.
 */
export function buildTransitionGraph(config: Configuration): TransitionGraph {
  const graph = new Map<StateName, StateName[]>();
  for (const state of config.states) {
    graph.set(state.name, []);
  }

  for (const transition of config.transitions) {
    const targets = graph.get(transition.to);
    if (!targets) continue;

    for (const from of transition.from) {
      const neighbours = graph.get(from);
      if (neighbours && !neighbours.includes(transition.to)) {
        neighbours.push(transition.to);
      }
    }
  }

  return graph;
}

/**
 * Explicit initial states when the document declares them, otherwise every
 * declared state without incoming transitions.
 */
export function initialStatesOf(config: Configuration): StateName[] {
  const declared = new Set(config.states.map(state => state.name));

  if (config.initialStates) {
    return config.initialStates.filter(state => declared.has(state));
  }

  const withIncoming = new Set<StateName>();
  for (const transition of config.transitions) {
    if (transition.from.some(from => declared.has(from))) {
      withIncoming.add(transition.to);
    }
  }
  return config.states.map(state => state.name).filter(name => !withIncoming.has(name));
}

/**
 * States no transition leaves.
 */
export function terminalStatesOf(config: Configuration): StateName[] {
  return config.states.map(state => state.name).filter(name => isTerminalState(config, name));
}

export function isTerminalState(config: Configuration, state: StateName): boolean {
  return !config.transitions.some(transition => transition.from.includes(state));
}

/**
 * Finds every back edge of a depth-first traversal started from each state
 * in declaration order. Each cycle is returned once as its full path with
 * the first state repeated at the end.
 */
export function findCycles(config: Configuration, graph: TransitionGraph = buildTransitionGraph(config)): StateName[][] {
  const visited = new Set<StateName>();
  const recursionStack = new Set<StateName>();
  const path: StateName[] = [];
  const cycles: StateName[][] = [];
  const seen = new Set<string>();

  const visit = (node: StateName): void => {
    visited.add(node);
    recursionStack.add(node);
    path.push(node);

    for (const neighbour of graph.get(node) ?? []) {
      if (recursionStack.has(neighbour)) {
        const cycle = path.slice(path.indexOf(neighbour));
        const key = canonicalCycleKey(cycle);
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push([...cycle, neighbour]);
        }
      } else if (!visited.has(neighbour)) {
        visit(neighbour);
      }
    }

    recursionStack.delete(node);
    path.pop();
  };

  for (const state of config.states) {
    if (!visited.has(state.name)) {
      visit(state.name);
    }
  }

  return cycles;
}

function canonicalCycleKey(cycle: StateName[]): string {
  let start = 0;
  cycle.forEach((state, index) => {
    const current = cycle[start];
    if (current !== undefined && state < current) start = index;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)].join('\u0000');
}

/**
 * States a breadth-first traversal from the initial set never reaches,
 * in declaration order.
 */
export function findUnreachableStates(config: Configuration, graph: TransitionGraph = buildTransitionGraph(config)): StateName[] {
  const reached = new Set<StateName>(initialStatesOf(config));
  const queue: StateName[] = Array.from(reached);

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    for (const neighbour of graph.get(next) ?? []) {
      if (!reached.has(neighbour)) {
        reached.add(neighbour);
        queue.push(neighbour);
      }
    }
  }

  return config.states.map(state => state.name).filter(name => !reached.has(name));
}

/**
 * Semantic validation of a loaded Configuration: cycles, reachability,
 * reference integrity and advisory agent checks.
 *
 * @example
 * ```typescript
 * const report = new GraphValidator().validate(config);
 * if (!report.isValid) throw new GraphError(report.errors, config.source);
 * ```
 */
export class GraphValidator {
  private readonly extraAgents: readonly string[];
  private readonly replaceBundledAgents: boolean;

  constructor(options: GraphValidatorOptions = {}) {
    this.extraAgents = options.knownAgents ?? [];
    this.replaceBundledAgents = options.replaceBundledAgents ?? false;
  }

  validate(config: Configuration): ValidationReport {
    const errors: GraphIssue[] = [];
    const warnings: GraphIssue[] = [];
    const graph = buildTransitionGraph(config);

    this.checkReferences(config, errors);
    this.checkInitialStates(config, errors);
    this.checkCycles(config, graph, errors);
    this.checkTerminalStates(config, errors);
    this.checkReachability(config, graph, warnings);
    this.checkAgents(config, warnings);
    this.checkUnusedWorkflows(config, warnings);

    logger.debug(`Validated ${config.source ?? 'configuration'}: ${errors.length} errors, ${warnings.length} warnings`);

    return { isValid: errors.length === 0, errors, warnings };
  }

  /**
   * Validates and throws GraphError when the report has errors.
   * @returns the warnings, for display
   */
  assertValid(config: Configuration): GraphIssue[] {
    const report = this.validate(config);
    if (!report.isValid) {
      throw new GraphError(report.errors, config.source);
    }
    return report.warnings;
  }

  knownAgents(config: Configuration): Set<string> {
    return new Set([
      ...(this.replaceBundledAgents ? [] : BUNDLED_KNOWN_AGENTS),
      ...config.knownAgents,
      ...this.extraAgents,
    ]);
  }

  private checkReferences(config: Configuration, errors: GraphIssue[]): void {
    const states = new Set(config.states.map(state => state.name));
    const workflows = new Set(config.workflows.map(workflow => workflow.name));

    config.transitions.forEach((transition, transitionIndex) => {
      for (const from of transition.from) {
        if (!states.has(from)) {
          errors.push({
            severity: 'error',
            code: 'UNDEFINED_FROM_STATE',
            message: `Transition '${transition.name}' starts from undeclared state '${from}'`,
            states: [from],
            transitionIndex,
          });
        }
      }
      if (!states.has(transition.to)) {
        errors.push({
          severity: 'error',
          code: 'UNDEFINED_TO_STATE',
          message: `Transition '${transition.name}' leads to undeclared state '${transition.to}'`,
          states: [transition.to],
          transitionIndex,
        });
      }
      if (!workflows.has(transition.via)) {
        errors.push({
          severity: 'error',
          code: 'UNDEFINED_WORKFLOW_REFERENCE',
          message: `Transition '${transition.name}' runs through undeclared workflow '${transition.via}'`,
          states: [...transition.from, transition.to],
          transitionIndex,
          workflow: transition.via,
        });
      }
    });
  }

  private checkInitialStates(config: Configuration, errors: GraphIssue[]): void {
    const states = new Set(config.states.map(state => state.name));

    for (const initial of config.initialStates ?? []) {
      if (!states.has(initial)) {
        errors.push({
          severity: 'error',
          code: 'UNDEFINED_INITIAL_STATE',
          message: `Initial state '${initial}' is not declared`,
          states: [initial],
        });
      }
    }

    if (initialStatesOf(config).length === 0) {
      errors.push({
        severity: 'error',
        code: 'NO_INITIAL_STATE',
        message: 'No initial state: every state has an incoming transition',
        states: [],
      });
    }
  }

  private checkCycles(config: Configuration, graph: TransitionGraph, errors: GraphIssue[]): void {
    for (const cycle of findCycles(config, graph)) {
      errors.push({
        severity: 'error',
        code: 'CYCLE_DETECTED',
        message: `Cycle detected: ${cycle.join(' -> ')}`,
        states: cycle,
      });
    }
  }

  private checkTerminalStates(config: Configuration, errors: GraphIssue[]): void {
    if (terminalStatesOf(config).length === 0) {
      errors.push({
        severity: 'error',
        code: 'NO_TERMINAL_STATE',
        message: 'No terminal state: every state has an outgoing transition',
        states: [],
      });
    }
  }

  private checkReachability(config: Configuration, graph: TransitionGraph, warnings: GraphIssue[]): void {
    for (const state of findUnreachableStates(config, graph)) {
      warnings.push({
        severity: 'warning',
        code: 'UNREACHABLE_STATE',
        message: `State '${state}' cannot be reached from the initial states`,
        states: [state],
      });
    }
  }

  private checkAgents(config: Configuration, warnings: GraphIssue[]): void {
    const known = this.knownAgents(config);

    for (const workflow of config.workflows) {
      for (const agent of workflow.agentReferences) {
        if (!known.has(agent)) {
          warnings.push({
            severity: 'warning',
            code: 'UNKNOWN_AGENT',
            message: `Workflow '${workflow.name}' references unknown agent '${agent}'`,
            states: [],
            workflow: workflow.name,
            agent,
          });
        }
      }
    }

    for (const loop of ['inner', 'outer'] as const) {
      for (const agent of config.agentLoops[loop]) {
        if (!known.has(agent)) {
          warnings.push({
            severity: 'warning',
            code: 'UNKNOWN_AGENT_IN_LOOP',
            message: `The ${loop} loop references unknown agent '${agent}'`,
            states: [],
            agent,
          });
        }
      }
    }
  }

  private checkUnusedWorkflows(config: Configuration, warnings: GraphIssue[]): void {
    const used = new Set(config.transitions.map(transition => transition.via));

    for (const workflow of config.workflows) {
      if (!used.has(workflow.name)) {
        warnings.push({
          severity: 'warning',
          code: 'UNUSED_WORKFLOW',
          message: `Workflow '${workflow.name}' is not used by any transition`,
          states: [],
          workflow: workflow.name,
        });
      }
    }
  }
}
