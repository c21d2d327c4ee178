import { buildArtifactResult } from './artifact_result';
import type {
  AdrFacts,
  ArtifactValidationResult,
  ArtifactValidator,
  ArtifactValidatorOptions,
} from './artifact_validators.types';
import { baseName, findEmptySections, findSections, hasSection, sectionName, titleCase } from './markdown_sections';

export const ADR_REQUIRED_SECTIONS = ['Status', 'Context', 'Decision', 'Consequences'] as const;

export const ADR_RECOMMENDED_SECTIONS = ['Alternatives Considered'] as const;

export const ADR_STATUSES = ['proposed', 'accepted', 'deprecated', 'superseded'] as const;

export const ADR_FILENAME_PATTERN = /^ADR-(\d{3})-(.+)\.md$/;

const SUPERSEDED_BY_PATTERN = /^superseded by adr-\d{3}/;

/**
 * Number and title encoded in an `ADR-NNN-slug.md` file name.
 */
export function parseAdrFileName(fileName: string): { number: number; title: string } | null {
  const match = ADR_FILENAME_PATTERN.exec(fileName);
  const digits = match?.[1];
  const slug = match?.[2];
  if (digits === undefined || slug === undefined) return null;
  return { number: Number.parseInt(digits, 10), title: titleCase(slug.replace(/-/g, ' ')) };
}

/**
 * Status value: the first line under `## Status`, or an inline
 * `Status: value` line. Emphasis markers around the value are dropped.
 */
export function extractAdrStatus(content: string): string | null {
  let inStatusSection = false;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed.toLowerCase() === '## status') {
      inStatusSection = true;
      continue;
    }
    if (inStatusSection && trimmed !== '') {
      if (sectionName(trimmed) !== null) return null;
      return stripEmphasis(trimmed);
    }
    if (trimmed.toLowerCase().startsWith('status:')) {
      return stripEmphasis(trimmed.slice('status:'.length).trim());
    }
  }

  return null;
}

function stripEmphasis(value: string): string {
  return value.replace(/^[*_]+|[*_]+$/g, '').trim();
}

/**
 * Decision record (ADR) validator: Nygard sections, a known status and an
 * `ADR-NNN-slug.md` file name.
 */
export class AdrValidator implements ArtifactValidator<AdrFacts> {
  readonly artifactType = 'adr';
  private readonly strict: boolean;

  constructor(options: ArtifactValidatorOptions = {}) {
    this.strict = options.strict ?? false;
  }

  validate(artifactPath: string, content: string): ArtifactValidationResult<AdrFacts> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const missingSections: string[] = [];

    const fileName = baseName(artifactPath);
    const parsedName = parseAdrFileName(fileName);
    if (!parsedName) {
      errors.push(`Invalid ADR file name '${fileName}': expected ADR-NNN-slug.md`);
    }

    const sectionsFound = findSections(content);
    for (const required of ADR_REQUIRED_SECTIONS) {
      if (!hasSection(sectionsFound, required)) {
        missingSections.push(required);
        errors.push(`Missing required section '## ${required}'`);
      }
    }
    for (const recommended of ADR_RECOMMENDED_SECTIONS) {
      if (!hasSection(sectionsFound, recommended)) {
        warnings.push(`Recommended section missing: '## ${recommended}'`);
      }
    }

    const status = extractAdrStatus(content);
    if (status) {
      const normalized = status.toLowerCase();
      if (normalized.startsWith('superseded')) {
        if (!SUPERSEDED_BY_PATTERN.test(normalized)) {
          warnings.push(`Superseded status should name its replacement as 'Superseded by ADR-NNN' (found '${status}')`);
        }
      } else if (!ADR_STATUSES.some(valid => valid === normalized)) {
        errors.push(`Invalid status '${status}': expected Proposed, Accepted, Deprecated or Superseded by ADR-NNN`);
      }
    } else if (hasSection(sectionsFound, 'Status')) {
      warnings.push('Status section has no status value');
    }

    for (const empty of findEmptySections(content, [...ADR_REQUIRED_SECTIONS])) {
      errors.push(`Section '## ${empty}' is empty`);
    }

    return buildArtifactResult({
      artifactType: this.artifactType,
      artifactPath,
      missingSections,
      errors,
      warnings,
      sectionsFound,
      facts: {
        adrNumber: parsedName?.number ?? null,
        adrTitle: parsedName?.title ?? null,
        status,
      },
      strict: this.strict,
    });
  }
}
