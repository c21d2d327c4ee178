import type { ArtifactValidatorRegistry } from '../artifact_validators';
import type { FileLister } from '../file_lister';
import type { Logger } from '../logger';
import type {
  AcceptanceCriteriaPolicy,
  ArtifactContext,
  Configuration,
  StateName,
  Task,
  Transition,
} from '../workflow_model';

export type GateReasonCode =
  | 'INVALID_SOURCE_STATE'
  | 'MISSING_INPUT_ARTIFACT'
  | 'MISSING_OUTPUT_ARTIFACT'
  | 'ARTIFACT_INVALID'
  | 'APPROVAL_REQUIRED'
  | 'PR_NOT_MERGED'
  | 'INCOMPLETE_ACCEPTANCE_CRITERIA';

/** Fatal reasons deny the transition; advisory ones are reported only */
export type GateSeverity = 'fatal' | 'advisory';

export type GateReason = {
  code: GateReasonCode;
  severity: GateSeverity;
  message: string;
  artifactType?: string;
  /** Resolved path, or the glob when nothing matched */
  artifactPath?: string;
  /** Validator errors, unchecked criteria, ... */
  details?: string[];
};

/**
 * Pull-request state reported by the caller. The engine never queries a
 * forge itself.
 */
export type PullRequestStatus = {
  merged: boolean;
  number?: number;
  url?: string;
};

export type GateRequest = {
  task: Task;
  transition: Transition;
  /** Overrides values taken from task metadata */
  artifactContext?: ArtifactContext;
  approvalKeyword?: string;
  pullRequest?: PullRequestStatus;
  /** Emergency override: every gate after the source-state check is bypassed */
  skipValidation?: boolean;
};

export type GateResult = {
  allowed: boolean;
  taskId: string;
  transition: Transition;
  fromState: StateName;
  /** Destination when allowed, null otherwise */
  proposedState: StateName | null;
  reasons: GateReason[];
  skipped: boolean;
};

export type ValidationEngineOptions = {
  /** Overrides `policy.acceptance_criteria` of the document */
  acceptanceCriteriaPolicy?: AcceptanceCriteriaPolicy;
};

export type ValidationEngineDependencies = {
  configuration: Configuration;
  fileLister: FileLister;
  /** Content validators by artifact type. Default: PRD and ADR */
  validators?: ArtifactValidatorRegistry;
  logger?: Logger;
  options?: ValidationEngineOptions;
};
