import * as yaml from 'js-yaml';
import { extractAcceptanceCriteria } from '../ac_coverage';
import { errorMessage } from '../errors';
import type { StateName } from '../workflow_model';
import { TaskFileError } from './task_store.errors';
import type { ParsedTaskFile } from './task_store.types';

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;
const STATUS_LINE = /^status:.*$/m;

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a Markdown task file: YAML front matter with `id` and `status`,
 * any other keys kept as metadata, and an Acceptance Criteria checklist
 * in the body.
 *
 * @param fallbackId - Used when the front matter has no `id`
 * @throws TaskFileError
 */
export function parseTaskFile(content: string, filePath: string, fallbackId?: string): ParsedTaskFile {
  const match = FRONT_MATTER.exec(content);
  const rawFrontMatter = match?.[1];
  if (!match || rawFrontMatter === undefined) {
    throw new TaskFileError('Missing YAML front matter', filePath);
  }

  let frontMatter: unknown;
  try {
    frontMatter = yaml.load(rawFrontMatter);
  } catch (error) {
    throw new TaskFileError(`Invalid front matter: ${errorMessage(error)}`, filePath);
  }
  if (!isMapping(frontMatter)) {
    throw new TaskFileError('Front matter must be a mapping', filePath);
  }

  const { id: rawId, status, ...metadata } = frontMatter;
  const id = typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId).trim() : fallbackId;
  if (!id) {
    throw new TaskFileError("Front matter has no 'id'", filePath);
  }
  if (typeof status !== 'string' || status.trim() === '') {
    throw new TaskFileError("Front matter has no 'status'", filePath);
  }

  const body = content.slice(match[0].length);
  return {
    task: {
      id,
      currentState: status.trim(),
      acceptanceCriteria: extractAcceptanceCriteria(body),
      metadata,
    },
    frontMatter,
    body,
  };
}

/**
 * Rewrites the `status` field of the front matter and leaves every other
 * byte of the file as it was.
 *
 * @throws TaskFileError when the file has no front matter
 */
export function updateTaskStatus(content: string, status: StateName, filePath: string): string {
  const match = FRONT_MATTER.exec(content);
  const rawFrontMatter = match?.[1];
  if (!match || rawFrontMatter === undefined) {
    throw new TaskFileError('Missing YAML front matter', filePath);
  }

  const statusLine = `status: ${yaml.dump(status, { lineWidth: -1 }).trimEnd()}`;
  const updated = STATUS_LINE.test(rawFrontMatter)
    ? rawFrontMatter.replace(STATUS_LINE, statusLine)
    : `${rawFrontMatter}\n${statusLine}`;

  const opening = content.startsWith('---\r\n') ? 5 : 4;
  return content.slice(0, opening) + updated + content.slice(opening + rawFrontMatter.length);
}
