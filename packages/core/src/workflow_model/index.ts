export { ConfigurationBuilder } from './configuration_builder';
export type {
  ArtifactInput,
  ConfigurationHeader,
  StateInput,
  TransitionInput,
  WorkflowInput,
} from './configuration_builder';
export {
  NONE,
  PULL_REQUEST,
  describeValidationMode,
  formatValidationMode,
  keywordApproval,
  parseValidationMode,
} from './validation_mode';
export {
  PLACEHOLDER_TOKENS,
  formatSequenceNumber,
  placeholdersOf,
  resolveArtifactPath,
  resolveArtifactPattern,
} from './artifact_pattern';
export type { PlaceholderToken, ResolvedArtifactPattern } from './artifact_pattern';
export type {
  AcceptanceCriteriaPolicy,
  AcceptanceCriterion,
  AgentLoops,
  ArtifactContext,
  ArtifactDescriptor,
  Configuration,
  LoopKind,
  State,
  StateName,
  Task,
  Transition,
  ValidationMode,
  ValidationModeKind,
  WorkflowDefinition,
  WorkflowPolicy,
} from './workflow_model.types';
