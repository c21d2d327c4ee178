import * as path from 'path';
import { Command } from 'commander';
import { ArtifactValidators, Errors } from '@flowgate/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ArtifactValidateOptions extends BaseCommandOptions {
  strict?: boolean;
}

export interface ArtifactAdrsOptions extends BaseCommandOptions {
  strict?: boolean;
  minCount?: number;
}

export const DEFAULT_ADR_DIR = path.join('docs', 'adr');

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

/**
 * Artifact Command - runs the registered content validators on files
 * outside of a transition.
 */
export class ArtifactCommand extends BaseCommand {
  register(program: Command): void {
    const artifact = program
      .command('artifact')
      .description('Validate PRD and ADR documents');

    artifact
      .command('validate <type> <file>')
      .description('Run the validator registered for <type> (prd, adr) on a file')
      .option('--strict', 'Report warnings as errors')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (type: string, file: string, options: ArtifactValidateOptions) => {
        await this.executeValidate(type, file, options);
      });

    artifact
      .command('adrs [dir]')
      .description(`Validate every ADR in a directory (default: ${DEFAULT_ADR_DIR})`)
      .option('--min-count <n>', 'Minimum number of ADRs expected', parseInteger, 1)
      .option('--strict', 'Report warnings as errors')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (dir: string | undefined, options: ArtifactAdrsOptions) => {
        await this.executeAdrs(dir ?? DEFAULT_ADR_DIR, options);
      });
  }

  async executeValidate(type: string, file: string, options: ArtifactValidateOptions): Promise<void> {
    const registry = this.container.getArtifactRegistry({ strict: options.strict ?? false });
    const validator = registry.get(type);
    if (!validator) {
      const error = new ArtifactValidators.UnknownArtifactTypeError(type, registry.types());
      this.handleError(error.message, options, { error });
      return;
    }

    try {
      // The lister is rooted at the file's directory so paths outside the project work too.
      const absolute = path.resolve(this.container.getSettings().cwd, file);
      const result = await ArtifactValidators.validateArtifactFile(
        validator,
        path.basename(absolute),
        this.container.getFileLister(path.dirname(absolute))
      );
      const data = { ...result, artifactPath: file };
      const label = validator.artifactType.toUpperCase();

      if (!result.ok) {
        this.handleError(`${file} is not a valid ${label}`, options, {
          details: [
            ...result.errors.map(error => `  - ${error}`),
            ...result.warnings.map(warning => `  ⚠️  ${warning}`),
          ],
          data,
        });
        return;
      }

      this.handleSuccess(data, options, `${file} is a valid ${label}`, result.warnings.map(warning => `  ⚠️  ${warning}`));
    } catch (error) {
      this.handleError(`Failed to validate ${file}: ${Errors.errorMessage(error)}`, options, { error });
    }
  }

  async executeAdrs(dir: string, options: ArtifactAdrsOptions): Promise<void> {
    const minCount = options.minCount ?? 1;
    if (Number.isNaN(minCount) || minCount < 0) {
      this.handleError('--min-count must be a non-negative integer', options);
      return;
    }

    try {
      const absolute = path.resolve(this.container.getSettings().cwd, dir);
      const fileLister = this.container.getFileLister(path.dirname(absolute));
      const directory = path.basename(absolute);

      const result = await ArtifactValidators.validateAdrDirectory(fileLister, directory, {
        minCount,
        strict: options.strict ?? false,
      });
      const nextNumber = await ArtifactValidators.getNextAdrNumber(fileLister, directory);
      const data = { ...result, directory: dir, count: result.results.length, nextNumber };

      if (!result.ok) {
        this.handleError(`${dir} has ${result.errors.length} ADR error(s)`, options, {
          details: [
            ...result.errors.map(error => `  - ${error}`),
            ...result.warnings.map(warning => `  ⚠️  ${warning}`),
          ],
          data,
        });
        return;
      }

      this.handleSuccess(data, options, `${data.count} valid ADR(s) in ${dir}`, [
        ...result.warnings.map(warning => `  ⚠️  ${warning}`),
        `  Next ADR number: ${String(nextNumber).padStart(3, '0')}`,
      ]);
    } catch (error) {
      this.handleError(`Failed to validate ADRs in ${dir}: ${Errors.errorMessage(error)}`, options, { error });
    }
  }
}
