import { buildArtifactResult } from './artifact_result';
import type {
  ArtifactValidationResult,
  ArtifactValidator,
  ArtifactValidatorOptions,
  PrdFacts,
} from './artifact_validators.types';
import { baseName, countMatches, findEmptySections, findSections, hasSection, titleCase } from './markdown_sections';

export const PRD_REQUIRED_SECTIONS = [
  'Executive Summary',
  'Problem Statement',
  'User Stories',
  'Functional Requirements',
  'Non-Functional Requirements',
  'Success Metrics',
  'All Needed Context',
] as const;

export const PRD_RECOMMENDED_SECTIONS = [
  'Dependencies',
  'Risks and Mitigations',
  'Out of Scope',
] as const;

const PRD_FILENAME_PATTERN = /^[\w-]+\.md$/;

/** "As a <user>, I want <goal> so that <benefit>", optionally prefixed "US1:" */
const USER_STORY_PATTERN = /(?:US\d+:?\s*)?As (?:a|an) .+?,\s*I want .+?\s*(?:so that|in order to) .+/gi;

/** "AC1: ..." or a checklist item */
const ACCEPTANCE_CRITERION_PATTERN = /(?:AC\d+:?|[-*]\s*\[[ x]\])\s*.+/gi;

/** Table row whose second cell points into examples/, placeholders excluded */
const EXAMPLE_REFERENCE_PATTERN = /^\s*\|\s*[^|]+\s*\|\s*`?examples\/[^|`{}]+`?\s*\|\s*[^|]+\s*\|/gm;

/**
 * Requirements document (PRD) validator: required sections, user stories
 * with acceptance criteria, and references to examples.
 */
export class PrdValidator implements ArtifactValidator<PrdFacts> {
  readonly artifactType = 'prd';
  private readonly strict: boolean;

  constructor(options: ArtifactValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  validate(artifactPath: string, content: string): ArtifactValidationResult<PrdFacts> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const missingSections: string[] = [];

    const fileName = baseName(artifactPath);
    let featureName: string | null = null;
    if (PRD_FILENAME_PATTERN.test(fileName)) {
      featureName = titleCase(fileName.replace(/\.md$/, '').replace(/[-_]/g, ' '));
    } else {
      errors.push(`Invalid PRD file name '${fileName}': expected {feature-slug}.md`);
    }

    const sectionsFound = findSections(content);
    for (const required of PRD_REQUIRED_SECTIONS) {
      if (!hasSection(sectionsFound, required)) {
        missingSections.push(required);
        errors.push(`Missing required section '## ${required}'`);
      }
    }
    for (const recommended of PRD_RECOMMENDED_SECTIONS) {
      if (!hasSection(sectionsFound, recommended)) {
        warnings.push(`Recommended section missing: '## ${recommended}'`);
      }
    }

    const userStoryCount = countMatches(content, USER_STORY_PATTERN);
    if (userStoryCount === 0) {
      errors.push("No user stories found: expected 'As a <user>, I want <goal> so that <benefit>'");
    }

    const acceptanceCriteriaCount = countMatches(content, ACCEPTANCE_CRITERION_PATTERN);
    if (acceptanceCriteriaCount === 0 && userStoryCount > 0) {
      warnings.push('User stories have no acceptance criteria (AC1:, AC2: or checklist items)');
    }

    const exampleCount = countMatches(content, EXAMPLE_REFERENCE_PATTERN);
    if (exampleCount === 0) {
      errors.push("No example references found: add a table row pointing at an examples/ path under '## All Needed Context'");
    }

    for (const empty of findEmptySections(content, [...PRD_REQUIRED_SECTIONS])) {
      errors.push(`Section '## ${empty}' is empty`);
    }

    return buildArtifactResult({
      artifactType: this.artifactType,
      artifactPath,
      missingSections,
      errors,
      warnings,
      sectionsFound,
      facts: { featureName, userStoryCount, acceptanceCriteriaCount, exampleCount },
      strict: this.strict,
    });
  }
}
