import { normalizeRelativePath } from '../file_lister';
import type { ArtifactContext } from './workflow_model.types';

export const PLACEHOLDER_TOKENS = ['feature', 'slug', 'NNN'] as const;

export type PlaceholderToken = typeof PLACEHOLDER_TOKENS[number];

const TOKEN_PATTERN = /\{(feature|slug|NNN)\}/g;
const GLOB_CHARS = /[*?[\]]/;

/**
 * A path pattern after substituting the task context.
 */
export type ResolvedArtifactPattern = {
  /** Normalized path with known tokens substituted */
  path: string;
  /** Glob that lists every file the pattern may denote */
  glob: string;
  /** A single file path with nothing left to match */
  isConcrete: boolean;
  /** Pattern names a directory (trailing slash) */
  isDirectory: boolean;
  unresolvedTokens: PlaceholderToken[];
};

function isPlaceholderToken(value: string): value is PlaceholderToken {
  return PLACEHOLDER_TOKENS.some(token => token === value);
}

export function formatSequenceNumber(value: number): string {
  return String(Math.trunc(value)).padStart(3, '0');
}

function tokenValue(token: PlaceholderToken, context: ArtifactContext): string | undefined {
  switch (token) {
    case 'feature':
      return context.feature;
    case 'slug':
      return context.slug ?? context.feature;
    case 'NNN':
      return context.number === undefined ? undefined : formatSequenceNumber(context.number);
  }
}

function tokenGlob(token: PlaceholderToken): string {
  return token === 'NNN' ? '[0-9][0-9][0-9]' : '*';
}

/**
 * Lists the placeholder tokens a pattern uses, in order of appearance.
 */
export function placeholdersOf(pattern: string): PlaceholderToken[] {
  const tokens: PlaceholderToken[] = [];
  for (const match of pattern.matchAll(TOKEN_PATTERN)) {
    const token = match[1];
    if (token !== undefined && isPlaceholderToken(token) && !tokens.includes(token)) {
      tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Substitutes the tokens the context provides. Tokens without a value
 * stay in place.
 *
 * @example
 * resolveArtifactPath('./docs/prd/{feature}.md', { feature: 'auth' }) // 'docs/prd/auth.md'
 */
export function resolveArtifactPath(pattern: string, context: ArtifactContext = {}): string {
  const substituted = pattern.replace(TOKEN_PATTERN, (whole: string, token: string) => {
    if (!isPlaceholderToken(token)) return whole;
    return tokenValue(token, context) ?? whole;
  });
  return normalizeRelativePath(substituted);
}

export function resolveArtifactPattern(pattern: string, context: ArtifactContext = {}): ResolvedArtifactPattern {
  const isDirectory = /\/\s*$/.test(pattern) || normalizeRelativePath(pattern) === '' || pattern.trim() === '.';
  const resolvedPath = resolveArtifactPath(pattern, context);
  const unresolvedTokens = placeholdersOf(resolvedPath);

  let glob = resolvedPath.replace(TOKEN_PATTERN, (whole: string, token: string) =>
    isPlaceholderToken(token) ? tokenGlob(token) : whole
  );
  if (isDirectory) {
    glob = glob === '' || glob === '.' ? '**' : `${glob}/**`;
  }

  return {
    path: resolvedPath,
    glob,
    isConcrete: !isDirectory && unresolvedTokens.length === 0 && !GLOB_CHARS.test(resolvedPath),
    isDirectory,
    unresolvedTokens,
  };
}
