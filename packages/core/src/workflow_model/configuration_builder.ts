import { ConfigError } from '../config_loader/config_loader.errors';
import { parseValidationMode } from './validation_mode';
import type {
  AcceptanceCriteriaPolicy,
  AgentLoops,
  ArtifactDescriptor,
  Configuration,
  LoopKind,
  State,
  StateName,
  Transition,
  ValidationMode,
  WorkflowDefinition,
} from './workflow_model.types';

export type StateInput = {
  name: string;
  description?: string;
};

export type WorkflowInput = {
  name: string;
  command?: string;
  description?: string;
  agents?: string[];
  loop?: LoopKind;
};

export type ArtifactInput = {
  type: string;
  path: string;
  required?: boolean;
  multiple?: boolean;
};

export type TransitionInput = {
  name?: string;
  from: StateName | StateName[];
  to: StateName;
  via: string;
  /** Document notation (`KEYWORD["X"]`) or an already typed mode */
  validation?: string | ValidationMode;
  inputArtifacts?: ArtifactInput[];
  outputArtifacts?: ArtifactInput[];
  description?: string;
};

export type ConfigurationHeader = {
  version?: string;
  description?: string;
  source?: string | null;
};

function violation(location: string, detail: string, value?: unknown): ConfigError {
  return new ConfigError('SCHEMA_VIOLATION', detail, location, [{ field: location, message: detail, value }]);
}

function requireText(value: string, location: string, what: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw violation(location, `${what} must be a non-empty string`, value);
  }
  return trimmed;
}

const ABSOLUTE_PATH = /^(?:[\\/]|[A-Za-z]:)/;

function requireProjectPath(value: string, location: string): string {
  const text = requireText(value, location, 'Artifact path');
  if (text.split(/[\\/]/).includes('..') || ABSOLUTE_PATH.test(text)) {
    throw violation(location, `Artifact path '${text}' must stay inside the project root`, value);
  }
  return text;
}

function freezeList<T>(items: T[]): readonly T[] {
  return Object.freeze([...items]);
}

/**
 * The only way to obtain a Configuration. Each step checks its input and
 * throws ConfigError(SCHEMA_VIOLATION) with the JSON pointer of the
 * offending value, so a malformed document never yields a partial graph.
 * Reference integrity (undeclared states or workflows) is left to the
 * graph validator.
 *
 * @example
 * ```typescript
 * const config = new ConfigurationBuilder({ version: '1.0' })
 *   .addState({ name: 'To Do' })
 *   .addState({ name: 'Done' })
 *   .addWorkflow({ name: 'finish', command: '/flow:finish' })
 *   .addTransition({ from: 'To Do', to: 'Done', via: 'finish' })
 *   .build();
 * ```
 */
export class ConfigurationBuilder {
  private readonly states: State[] = [];
  private readonly stateNames = new Set<string>();
  private readonly workflows: WorkflowDefinition[] = [];
  private readonly workflowNames = new Set<string>();
  private readonly transitions: Transition[] = [];
  private initialStates: StateName[] | null = null;
  private agentLoops: AgentLoops = { inner: [], outer: [] };
  private knownAgents: string[] = [];
  private acceptanceCriteriaPolicy: AcceptanceCriteriaPolicy = 'advisory';
  private built = false;

  constructor(private readonly header: ConfigurationHeader = {}) { }

  addState(input: StateInput | string): this {
    const location = `/states/${this.states.length}`;
    const state = typeof input === 'string' ? { name: input } : input;
    const name = requireText(state.name, location, 'State name');

    if (this.stateNames.has(name)) {
      throw violation(location, `Duplicate state name '${name}'`, name);
    }

    this.stateNames.add(name);
    this.states.push(Object.freeze({ name, description: state.description?.trim() ?? '' }));
    return this;
  }

  addWorkflow(input: WorkflowInput): this {
    const location = `/workflows/${input.name}`;
    const name = requireText(input.name, location, 'Workflow name');

    if (this.workflowNames.has(name)) {
      throw violation(location, `Duplicate workflow name '${name}'`, name);
    }

    const agentReferences = (input.agents ?? []).map((agent, index) =>
      requireText(agent, `${location}/agents/${index}`, 'Agent reference')
    );

    this.workflowNames.add(name);
    this.workflows.push(Object.freeze({
      name,
      command: input.command?.trim() || `/flow:${name}`,
      description: input.description?.trim() ?? '',
      agentReferences: freezeList(agentReferences),
      loop: input.loop ?? 'outer',
    }));
    return this;
  }

  addTransition(input: TransitionInput): this {
    const location = `/transitions/${this.transitions.length}`;
    const fromList = Array.isArray(input.from) ? input.from : [input.from];

    if (fromList.length === 0) {
      throw violation(`${location}/from`, 'Transition must have at least one source state', input.from);
    }

    const from = fromList.map((state, index) =>
      requireText(state, Array.isArray(input.from) ? `${location}/from/${index}` : `${location}/from`, 'Source state')
    );
    const to = requireText(input.to, `${location}/to`, 'Destination state');
    const via = requireText(input.via, `${location}/via`, 'Transition command');

    this.transitions.push(Object.freeze({
      name: input.name?.trim() || via,
      from: freezeList(Array.from(new Set(from))),
      to,
      via,
      validationMode: this.toValidationMode(input.validation, `${location}/validation`),
      inputArtifacts: this.toArtifacts(input.inputArtifacts ?? [], `${location}/input_artifacts`),
      outputArtifacts: this.toArtifacts(input.outputArtifacts ?? [], `${location}/output_artifacts`),
      description: input.description?.trim() ?? '',
    }));
    return this;
  }

  setInitialStates(states: StateName[]): this {
    if (states.length === 0) {
      throw violation('/initial_states', 'initial_states must list at least one state', states);
    }
    this.initialStates = states.map((state, index) => requireText(state, `/initial_states/${index}`, 'Initial state'));
    return this;
  }

  setAgentLoops(loops: { inner?: string[]; outer?: string[] }): this {
    this.agentLoops = Object.freeze({
      inner: freezeList((loops.inner ?? []).map((agent, index) => requireText(agent, `/agent_loops/inner/${index}`, 'Agent name'))),
      outer: freezeList((loops.outer ?? []).map((agent, index) => requireText(agent, `/agent_loops/outer/${index}`, 'Agent name'))),
    });
    return this;
  }

  addKnownAgents(agents: string[]): this {
    agents.forEach((agent, index) => {
      this.knownAgents.push(requireText(agent, `/known_agents/${index}`, 'Agent name'));
    });
    return this;
  }

  setAcceptanceCriteriaPolicy(policy: AcceptanceCriteriaPolicy): this {
    this.acceptanceCriteriaPolicy = policy;
    return this;
  }

  build(): Configuration {
    if (this.built) {
      throw new Error('ConfigurationBuilder.build() may only be called once');
    }
    if (this.states.length === 0) {
      throw violation('/states', 'A workflow must declare at least one state', []);
    }
    this.built = true;

    return Object.freeze({
      version: this.header.version?.trim() || '1.0',
      description: this.header.description?.trim() ?? '',
      states: freezeList(this.states),
      transitions: freezeList(this.transitions),
      workflows: freezeList(this.workflows),
      initialStates: this.initialStates ? freezeList(this.initialStates) : null,
      agentLoops: this.agentLoops,
      knownAgents: freezeList(Array.from(new Set(this.knownAgents))),
      policy: Object.freeze({ acceptanceCriteria: this.acceptanceCriteriaPolicy }),
      source: this.header.source ?? null,
    });
  }

  private toValidationMode(value: string | ValidationMode | undefined, location: string): ValidationMode {
    if (value === undefined) return { kind: 'none' };

    if (typeof value !== 'string') {
      if (value.kind === 'keyword') {
        requireText(value.keyword, `${location}/keyword`, 'Approval keyword');
        return { kind: 'keyword', keyword: value.keyword };
      }
      return value;
    }

    const mode = parseValidationMode(value);
    if (!mode) {
      throw violation(
        location,
        `Unknown validation mode '${value}'. Expected NONE, KEYWORD["<keyword>"] or PULL_REQUEST`,
        value
      );
    }
    return mode;
  }

  private toArtifacts(inputs: ArtifactInput[], location: string): readonly ArtifactDescriptor[] {
    return freezeList(inputs.map((input, index) => Object.freeze({
      type: requireText(input.type, `${location}/${index}/type`, 'Artifact type'),
      pathPattern: requireProjectPath(input.path, `${location}/${index}/path`),
      required: input.required ?? true,
      multiple: input.multiple ?? false,
    })));
  }
}
