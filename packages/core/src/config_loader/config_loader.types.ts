import type { AcceptanceCriteriaPolicy, LoopKind } from '../workflow_model';

/**
 * Shape of the workflow document after structural validation.
 * Keys follow the document's snake_case spelling.
 */
export type WorkflowDocument = {
  version?: string | number;
  description?: string;
  states: DocumentState[];
  initial_states?: string[];
  workflows: Record<string, DocumentWorkflow>;
  transitions: DocumentTransition[];
  agent_loops?: {
    inner?: string[];
    outer?: string[];
  };
  known_agents?: string[];
  policy?: {
    acceptance_criteria?: AcceptanceCriteriaPolicy;
  };
  metadata?: Record<string, unknown>;
};

export type DocumentState = string | {
  name: string;
  description?: string;
};

export type DocumentWorkflow = {
  command?: string;
  description?: string;
  agents?: string[];
  loop?: LoopKind;
};

export type DocumentArtifact = {
  type: string;
  path: string;
  required?: boolean;
  multiple?: boolean;
};

export type DocumentValidation = string | {
  mode: 'none' | 'keyword' | 'pull_request';
  keyword?: string;
};

export type DocumentTransition = {
  name?: string;
  from: string | string[];
  to: string;
  via: string;
  description?: string;
  validation?: DocumentValidation;
  input_artifacts?: DocumentArtifact[];
  output_artifacts?: DocumentArtifact[];
};

export type ParseWorkflowConfigOptions = {
  /** File the content came from; used in error locations and kept on the Configuration */
  source?: string;
  /** Companion schema (YAML or JSON) replacing the bundled one */
  schemaPath?: string;
};
