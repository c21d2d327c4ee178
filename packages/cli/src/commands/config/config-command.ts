import * as path from 'path';
import { Command } from 'commander';
import { ConfigLoader, GraphValidator } from '@flowgate/core';
import type { WorkflowModel } from '@flowgate/core';
import { initWorkflowConfig, loadWorkflowConfig } from '@flowgate/core/fs';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type ConfigValidateOptions = BaseCommandOptions;

export interface ConfigInitOptions extends BaseCommandOptions {
  force?: boolean;
}

export function formatIssue(issue: GraphValidator.GraphIssue): string {
  const marker = issue.severity === 'error' ? '-' : '⚠️ ';
  return `  ${marker} [${issue.code}] ${issue.message}`;
}

/**
 * Config Command - loads, validates and scaffolds workflow documents
 */
export class ConfigCommand extends BaseCommand {
  register(program: Command): void {
    const config = program
      .command('config')
      .description('Validate or create the workflow document');

    config
      .command('validate [path]')
      .description('Load a workflow document and check its graph (default: discovered document)')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (file: string | undefined, options: ConfigValidateOptions) => {
        await this.executeValidate(file, options);
      });

    config
      .command('init [dir]')
      .description('Write the bundled lifecycle as flowgate_workflow.yml (default: current directory)')
      .option('-f, --force', 'Overwrite an existing document')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (dir: string | undefined, options: ConfigInitOptions) => {
        await this.executeInit(dir, options);
      });
  }

  /**
   * Exit code 1 for a missing or malformed document and for graph errors;
   * warnings alone pass.
   */
  async executeValidate(file: string | undefined, options: ConfigValidateOptions): Promise<void> {
    const { cwd } = this.container.getSettings();
    const configPath = file ? path.resolve(cwd, file) : this.container.findConfigPath();
    if (!configPath) {
      this.handleError('No workflow document found. Pass a path, use --config or run `flowgate config init`.', options);
      return;
    }

    let configuration: WorkflowModel.Configuration;
    try {
      configuration = await loadWorkflowConfig(configPath);
    } catch (error) {
      if (error instanceof ConfigLoader.ConfigError) {
        this.handleError(error.message, options, {
          error,
          details: error.issues.map(issue => `  - ${issue.field}: ${issue.message}`),
        });
        return;
      }
      this.handleUnexpected('load workflow document', error, options);
      return;
    }

    const report = new GraphValidator.GraphValidator().validate(configuration);
    const data = {
      path: configPath,
      isValid: report.isValid,
      states: configuration.states.length,
      transitions: configuration.transitions.length,
      workflows: configuration.workflows.length,
      errors: report.errors,
      warnings: report.warnings,
    };

    if (!report.isValid) {
      this.handleError(`${configPath} has ${report.errors.length} graph error(s)`, options, {
        details: [...report.errors, ...report.warnings].map(formatIssue),
        data,
      });
      return;
    }

    this.handleSuccess(
      data,
      options,
      `${configPath} is valid (${data.states} states, ${data.transitions} transitions, ${data.workflows} workflows)`,
      report.warnings.map(formatIssue)
    );
  }

  async executeInit(dir: string | undefined, options: ConfigInitOptions): Promise<void> {
    const { cwd } = this.container.getSettings();
    try {
      const target = await initWorkflowConfig(path.resolve(cwd, dir ?? '.'), { force: options.force ?? false });
      this.handleSuccess({ path: target }, options, `Created ${target}`, [
        'Next: flowgate config validate',
      ]);
    } catch (error) {
      this.handleUnexpected('create workflow document', error, options);
    }
  }
}
