/**
 * Outcome of checking one artifact's content.
 *
 * @typeParam TFacts - What the validator extracted from the document
 */
export type ArtifactValidationResult<TFacts = Record<string, never>> = {
  ok: boolean;
  artifactType: string;
  artifactPath: string;
  /** Required sections the document lacks, by display name */
  missingSections: string[];
  errors: string[];
  warnings: string[];
  sectionsFound: string[];
  /** One-line summary for display */
  detail: string;
  facts: TFacts;
};

/**
 * Content validator for one artifact type. New artifact types plug in by
 * registering another implementation; the validation engine only sees
 * this interface.
 */
export interface ArtifactValidator<TFacts = unknown> {
  readonly artifactType: string;
  validate(artifactPath: string, content: string): ArtifactValidationResult<TFacts>;
}

export type ArtifactValidatorOptions = {
  /** Report warnings as errors */
  strict?: boolean;
};

export type PrdFacts = {
  featureName: string | null;
  userStoryCount: number;
  acceptanceCriteriaCount: number;
  exampleCount: number;
};

export type AdrFacts = {
  adrNumber: number | null;
  adrTitle: string | null;
  status: string | null;
};

export type AdrEntry = {
  number: number;
  title: string;
  path: string;
};

export type AdrDirectoryValidationResult = {
  ok: boolean;
  directory: string;
  errors: string[];
  warnings: string[];
  results: ArtifactValidationResult<AdrFacts>[];
};

export type AdrDirectoryOptions = ArtifactValidatorOptions & {
  /** Fewer ADRs than this is an error. Default: 1 */
  minCount?: number;
};
