import type { FileLister } from '../file_lister';
import { normalizeRelativePath } from '../file_lister';
import { createLogger } from '../logger';
import { AdrValidator, parseAdrFileName } from './adr_validator';
import type {
  AdrDirectoryOptions,
  AdrDirectoryValidationResult,
  AdrEntry,
  AdrFacts,
  ArtifactValidationResult,
} from './artifact_validators.types';
import { baseName } from './markdown_sections';

const logger = createLogger('[AdrDirectory] ');

/**
 * ADR files directly under `directory`, sorted by number. Files that do not
 * follow the `ADR-NNN-slug.md` naming are skipped.
 */
export async function findExistingAdrs(fileLister: FileLister, directory: string): Promise<AdrEntry[]> {
  const root = normalizeRelativePath(directory);
  const pattern = root ? `${root}/ADR-*.md` : 'ADR-*.md';
  const paths = await fileLister.list([pattern], { onlyFiles: true });

  const entries: AdrEntry[] = [];
  for (const path of paths) {
    const parsed = parseAdrFileName(baseName(path));
    if (parsed) {
      entries.push({ number: parsed.number, title: parsed.title, path });
    }
  }
  return entries.sort((a, b) => a.number - b.number || a.path.localeCompare(b.path));
}

/**
 * Highest existing ADR number plus one; 1 for an empty directory.
 */
export async function getNextAdrNumber(fileLister: FileLister, directory: string): Promise<number> {
  const entries = await findExistingAdrs(fileLister, directory);
  return entries.reduce((max, entry) => Math.max(max, entry.number), 0) + 1;
}

/**
 * Validates every ADR in a directory, plus directory-level rules: a minimum
 * count and unique numbers.
 */
export async function validateAdrDirectory(
  fileLister: FileLister,
  directory: string,
  options: AdrDirectoryOptions = {}
): Promise<AdrDirectoryValidationResult> {
  const minCount = options.minCount ?? 1;
  const validator = new AdrValidator({ strict: options.strict ?? false });
  const errors: string[] = [];
  const warnings: string[] = [];
  const results: ArtifactValidationResult<AdrFacts>[] = [];

  const entries = await findExistingAdrs(fileLister, directory);
  if (entries.length < minCount) {
    errors.push(`Found ${entries.length} ADR(s) in '${directory}', expected at least ${minCount}`);
  }

  const pathsByNumber = new Map<number, string[]>();
  for (const entry of entries) {
    pathsByNumber.set(entry.number, [...(pathsByNumber.get(entry.number) ?? []), entry.path]);
  }
  for (const [number, paths] of pathsByNumber) {
    if (paths.length > 1) {
      errors.push(`Duplicate ADR number ${String(number).padStart(3, '0')}: ${paths.join(', ')}`);
    }
  }

  for (const entry of entries) {
    const content = await fileLister.read(entry.path);
    const result = validator.validate(entry.path, content);
    results.push(result);
    if (!result.ok) {
      errors.push(result.detail);
    }
    warnings.push(...result.warnings.map(warning => `${entry.path}: ${warning}`));
  }

  logger.debug(`Validated ${entries.length} ADR(s) in ${directory}: ${errors.length} error(s)`);

  return { ok: errors.length === 0, directory, errors, warnings, results };
}
