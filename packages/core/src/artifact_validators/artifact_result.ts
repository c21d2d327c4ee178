import type { ArtifactValidationResult } from './artifact_validators.types';

type ResultParts<TFacts> = {
  artifactType: string;
  artifactPath: string;
  missingSections?: string[];
  errors: string[];
  warnings: string[];
  sectionsFound?: string[];
  facts: TFacts;
  strict?: boolean;
};

/**
 * Assembles a result: strict mode folds warnings into errors, and the
 * detail line summarizes what failed.
 */
export function buildArtifactResult<TFacts>(parts: ResultParts<TFacts>): ArtifactValidationResult<TFacts> {
  const errors = parts.strict ? [...parts.errors, ...parts.warnings] : [...parts.errors];
  const warnings = parts.strict ? [] : [...parts.warnings];
  const ok = errors.length === 0;

  let detail = `${parts.artifactType.toUpperCase()} ${parts.artifactPath} is valid`;
  if (!ok) {
    const [first, ...rest] = errors;
    detail = `${parts.artifactType.toUpperCase()} ${parts.artifactPath}: ${first}${rest.length ? ` (+${rest.length} more)` : ''}`;
  } else if (warnings.length) {
    detail += ` with ${warnings.length} warning(s)`;
  }

  return {
    ok,
    artifactType: parts.artifactType,
    artifactPath: parts.artifactPath,
    missingSections: parts.missingSections ?? [],
    errors,
    warnings,
    sectionsFound: parts.sectionsFound ?? [],
    detail,
    facts: parts.facts,
  };
}
