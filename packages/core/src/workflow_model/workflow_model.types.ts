/**
 * Typed model of a workflow configuration.
 *
 * Every value here is produced by ConfigurationBuilder and frozen, so a
 * Configuration never changes after it has been validated.
 */

export type StateName = string;

export type State = {
  readonly name: StateName;
  readonly description: string;
};

/**
 * A file (or set of files) a transition consumes or produces.
 * `pathPattern` may hold the tokens {feature}, {slug} and {NNN}.
 */
export type ArtifactDescriptor = {
  readonly type: string;
  readonly pathPattern: string;
  readonly required: boolean;
  /** Pattern may match several files; when required, at least one must exist */
  readonly multiple: boolean;
};

export type ValidationMode =
  | { readonly kind: 'none' }
  | { readonly kind: 'keyword'; readonly keyword: string }
  | { readonly kind: 'pull_request' };

export type ValidationModeKind = ValidationMode['kind'];

export type Transition = {
  readonly name: string;
  readonly from: readonly StateName[];
  readonly to: StateName;
  /** Name of the workflow whose command performs this transition */
  readonly via: string;
  readonly validationMode: ValidationMode;
  readonly inputArtifacts: readonly ArtifactDescriptor[];
  readonly outputArtifacts: readonly ArtifactDescriptor[];
  readonly description: string;
};

export type LoopKind = 'inner' | 'outer';

export type WorkflowDefinition = {
  readonly name: string;
  readonly command: string;
  readonly description: string;
  /** Advisory only; unknown names surface as graph warnings */
  readonly agentReferences: readonly string[];
  readonly loop: LoopKind;
};

export type AgentLoops = {
  readonly inner: readonly string[];
  readonly outer: readonly string[];
};

export type AcceptanceCriteriaPolicy = 'advisory' | 'blocking';

export type WorkflowPolicy = {
  readonly acceptanceCriteria: AcceptanceCriteriaPolicy;
};

export type Configuration = {
  readonly version: string;
  readonly description: string;
  readonly states: readonly State[];
  readonly transitions: readonly Transition[];
  readonly workflows: readonly WorkflowDefinition[];
  /** Explicit initial states; null means "states without incoming transitions" */
  readonly initialStates: readonly StateName[] | null;
  readonly agentLoops: AgentLoops;
  /** Agent names declared by the document on top of the bundled list */
  readonly knownAgents: readonly string[];
  readonly policy: WorkflowPolicy;
  /** Where the document was loaded from, when it came from a file */
  readonly source: string | null;
};

export type AcceptanceCriterion = {
  readonly index: number;
  readonly text: string;
  readonly checked: boolean;
};

/**
 * Snapshot of an externally owned task. The engine reads it and proposes
 * a new state; it never mutates it.
 */
export type Task = {
  readonly id: string;
  readonly currentState: StateName;
  readonly acceptanceCriteria: readonly AcceptanceCriterion[];
  readonly metadata: Readonly<Record<string, unknown>>;
};

/**
 * Values substituted into artifact path patterns.
 */
export type ArtifactContext = {
  feature?: string;
  /** Defaults to feature */
  slug?: string;
  /** Rendered zero-padded to three digits */
  number?: number;
};
