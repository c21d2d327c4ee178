import type { ValidationMode } from './workflow_model.types';

const KEYWORD_PATTERN = /^KEYWORD\["([^"]+)"\]$/i;

export const NONE: ValidationMode = { kind: 'none' };
export const PULL_REQUEST: ValidationMode = { kind: 'pull_request' };

export function keywordApproval(keyword: string): ValidationMode {
  return { kind: 'keyword', keyword };
}

/**
 * Parses the document notation: `NONE`, `KEYWORD["APPROVED"]` or
 * `PULL_REQUEST`. Mode names ignore case; the keyword is kept verbatim.
 * Returns null for anything else.
 */
export function parseValidationMode(value: string): ValidationMode | null {
  const trimmed = value.trim();
  const upper = trimmed.toUpperCase();

  if (upper === 'NONE') return NONE;
  if (upper === 'PULL_REQUEST') return PULL_REQUEST;

  const match = KEYWORD_PATTERN.exec(trimmed);
  const keyword = match?.[1];
  if (keyword !== undefined && keyword.trim() !== '') {
    return keywordApproval(keyword);
  }
  return null;
}

export function formatValidationMode(mode: ValidationMode): string {
  switch (mode.kind) {
    case 'none':
      return 'NONE';
    case 'keyword':
      return `KEYWORD["${mode.keyword}"]`;
    case 'pull_request':
      return 'PULL_REQUEST';
  }
}

export function describeValidationMode(mode: ValidationMode): string {
  switch (mode.kind) {
    case 'none':
      return 'automatic once artifacts exist';
    case 'keyword':
      return `requires approval keyword "${mode.keyword}"`;
    case 'pull_request':
      return 'requires a merged pull request';
  }
}
