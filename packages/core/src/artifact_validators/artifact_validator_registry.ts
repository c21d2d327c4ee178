import type { FileLister } from '../file_lister';
import { FileListerError } from '../file_lister';
import { AdrValidator } from './adr_validator';
import { buildArtifactResult } from './artifact_result';
import { UnknownArtifactTypeError } from './artifact_validators.errors';
import type {
  ArtifactValidationResult,
  ArtifactValidator,
  ArtifactValidatorOptions,
} from './artifact_validators.types';
import { PrdValidator } from './prd_validator';

/**
 * Artifact type → content validator. Lookups are case-insensitive.
 */
export class ArtifactValidatorRegistry {
  private readonly validators = new Map<string, ArtifactValidator>();

  register(artifactType: string, validator: ArtifactValidator): this {
    this.validators.set(artifactType.toLowerCase(), validator);
    return this;
  }

  get(artifactType: string): ArtifactValidator | undefined {
    return this.validators.get(artifactType.toLowerCase());
  }

  /**
   * @throws UnknownArtifactTypeError
   */
  require(artifactType: string): ArtifactValidator {
    const validator = this.get(artifactType);
    if (!validator) {
      throw new UnknownArtifactTypeError(artifactType, this.types());
    }
    return validator;
  }

  has(artifactType: string): boolean {
    return this.validators.has(artifactType.toLowerCase());
  }

  types(): string[] {
    return Array.from(this.validators.keys()).sort();
  }
}

/**
 * Registry with the bundled PRD and ADR validators.
 */
export function createDefaultRegistry(options: ArtifactValidatorOptions = {}): ArtifactValidatorRegistry {
  return new ArtifactValidatorRegistry()
    .register('prd', new PrdValidator(options))
    .register('adr', new AdrValidator(options));
}

/**
 * Reads an artifact and validates it. A file that cannot be read yields a
 * failed result instead of an exception.
 */
export async function validateArtifactFile(
  validator: ArtifactValidator,
  artifactPath: string,
  fileLister: FileLister
): Promise<ArtifactValidationResult<unknown>> {
  let content: string;
  try {
    content = await fileLister.read(artifactPath);
  } catch (error) {
    if (error instanceof FileListerError) {
      return buildArtifactResult<unknown>({
        artifactType: validator.artifactType,
        artifactPath,
        errors: [error.message],
        warnings: [],
        facts: null,
      });
    }
    throw error;
  }
  return validator.validate(artifactPath, content);
}
