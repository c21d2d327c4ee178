/**
 * Filesystem entry points of the config loader: reading a workflow document
 * from disk and discovering it from the working directory.
 *
 * NOTE: discovery is meant for CLI bootstrap; core modules receive an
 * already loaded Configuration.
 */

import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError } from '../config_loader.errors';
import { parseWorkflowConfig } from '../config_loader';
import { FlowgateError, isErrnoException } from '../../errors';
import type { Configuration } from '../../workflow_model';

export const CONFIG_ENV_VAR = 'FLOWGATE_CONFIG';

export const DEFAULT_CONFIG_FILENAMES = [
  'flowgate_workflow.yml',
  'flowgate_workflow.yaml',
  'flowgate_workflow.json',
  path.join('.flowgate', 'workflow.yml'),
] as const;

/** Lifecycle shipped with the package, copied by `initWorkflowConfig` */
export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '../../../templates/flowgate_workflow.yml');

export type LoadWorkflowConfigOptions = {
  schemaPath?: string;
};

/**
 * Reads and parses a workflow document.
 *
 * @throws ConfigError NOT_FOUND when the file does not exist
 */
export async function loadWorkflowConfig(
  filePath: string,
  options: LoadWorkflowConfigOptions = {}
): Promise<Configuration> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError('NOT_FOUND', `No workflow document at ${filePath}`, filePath);
    }
    throw error;
  }

  return parseWorkflowConfig(content, {
    source: filePath,
    ...(options.schemaPath !== undefined && { schemaPath: options.schemaPath }),
  });
}

/**
 * Locates the workflow document: FLOWGATE_CONFIG when set, otherwise the
 * first default file name found walking up from startPath.
 *
 * @returns Absolute path, or null when nothing was found
 */
export function findWorkflowConfig(
  startPath: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return path.resolve(startPath, fromEnv);
  }

  let currentPath = path.resolve(startPath);
  for (;;) {
    for (const fileName of DEFAULT_CONFIG_FILENAMES) {
      const candidate = path.join(currentPath, fileName);
      if (existsSync(candidate)) {
        return candidate;
      }
    }

    const parent = path.dirname(currentPath);
    if (parent === currentPath) {
      return null;
    }
    currentPath = parent;
  }
}

/**
 * Writes the bundled lifecycle as `flowgate_workflow.yml` in targetDir.
 *
 * @returns Path of the written file
 * @throws FlowgateError CONFIG_EXISTS unless `force` is set
 */
export async function initWorkflowConfig(
  targetDir: string,
  options: { force?: boolean } = {}
): Promise<string> {
  const [defaultFileName] = DEFAULT_CONFIG_FILENAMES;
  const target = path.join(path.resolve(targetDir), defaultFileName);
  if (!options.force && existsSync(target)) {
    throw new FlowgateError(`${target} already exists (use --force to overwrite)`, 'CONFIG_EXISTS');
  }

  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.copyFile(DEFAULT_TEMPLATE_PATH, target);
  return target;
}
