export { ValidationEngine, artifactContextFor } from './validation_engine';
export { GateFailure } from './validation_engine.errors';
export type {
  GateReason,
  GateReasonCode,
  GateRequest,
  GateResult,
  GateSeverity,
  PullRequestStatus,
  ValidationEngineDependencies,
  ValidationEngineOptions,
} from './validation_engine.types';
