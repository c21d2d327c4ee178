export { buildConfiguration, parseWorkflowConfig } from './config_loader';
export { ConfigError } from './config_loader.errors';
export type { ConfigErrorKind } from './config_loader.errors';
export type {
  DocumentArtifact,
  DocumentState,
  DocumentTransition,
  DocumentValidation,
  DocumentWorkflow,
  ParseWorkflowConfigOptions,
  WorkflowDocument,
} from './config_loader.types';
