import { FlowgateError } from '../errors';
import type { ArtifactValidationResult } from './artifact_validators.types';

/**
 * Error thrown when an artifact fails content validation.
 */
export class ArtifactValidationError extends FlowgateError {
  constructor(public readonly result: ArtifactValidationResult<unknown>) {
    super(result.detail, 'ARTIFACT_INVALID');
  }
}

export class UnknownArtifactTypeError extends FlowgateError {
  constructor(public readonly artifactType: string, available: string[]) {
    super(
      `No validator registered for artifact type '${artifactType}' (available: ${available.join(', ') || 'none'})`,
      'UNKNOWN_ARTIFACT_TYPE'
    );
  }
}

export function assertArtifactValid<TFacts>(result: ArtifactValidationResult<TFacts>): ArtifactValidationResult<TFacts> {
  if (!result.ok) {
    throw new ArtifactValidationError(result);
  }
  return result;
}
