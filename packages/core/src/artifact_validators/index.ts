export {
  ADR_FILENAME_PATTERN,
  ADR_RECOMMENDED_SECTIONS,
  ADR_REQUIRED_SECTIONS,
  ADR_STATUSES,
  AdrValidator,
  extractAdrStatus,
  parseAdrFileName,
} from './adr_validator';
export { findExistingAdrs, getNextAdrNumber, validateAdrDirectory } from './adr_directory';
export { PRD_RECOMMENDED_SECTIONS, PRD_REQUIRED_SECTIONS, PrdValidator } from './prd_validator';
export {
  ArtifactValidatorRegistry,
  createDefaultRegistry,
  validateArtifactFile,
} from './artifact_validator_registry';
export { buildArtifactResult } from './artifact_result';
export { findEmptySections, findSections } from './markdown_sections';
export {
  ArtifactValidationError,
  UnknownArtifactTypeError,
  assertArtifactValid,
} from './artifact_validators.errors';
export type {
  AdrDirectoryOptions,
  AdrDirectoryValidationResult,
  AdrEntry,
  AdrFacts,
  ArtifactValidationResult,
  ArtifactValidator,
  ArtifactValidatorOptions,
  PrdFacts,
} from './artifact_validators.types';
