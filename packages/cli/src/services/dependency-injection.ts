import * as path from 'path';
import {
  ArtifactValidators,
  ConfigLoader,
  GraphValidator,
  Logger,
  TransitionRunner,
  ValidationEngine,
} from '@flowgate/core';
import type { FileLister, TaskStore, WorkflowModel } from '@flowgate/core';
import {
  DEFAULT_CONFIG_FILENAMES,
  FsFileLister,
  FsTaskStore,
  findWorkflowConfig,
  loadWorkflowConfig,
} from '@flowgate/core/fs';

export const DEFAULT_TASKS_DIR = path.join('backlog', 'tasks');

/**
 * Values taken from the global CLI flags
 */
export type CliSettings = {
  cwd: string;
  /** --config; otherwise FLOWGATE_CONFIG or discovery from cwd */
  configPath?: string;
  /** --tasks-dir; otherwise backlog/tasks under the project root */
  tasksDir?: string;
  env: NodeJS.ProcessEnv;
};

export type LoadedConfiguration = {
  path: string;
  configuration: WorkflowModel.Configuration;
  warnings: GraphValidator.GraphIssue[];
};

const logger = Logger.createLogger('[CLI] ');

/**
 * Dependency Injection Service for the flowgate CLI
 *
 * Builds the engine from the global flags: the workflow document, a
 * filesystem lister rooted at the project, the markdown task store, the
 * validation engine and the transition runner. Each is created once.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private settings: CliSettings = { cwd: process.cwd(), env: process.env };
  private loaded: LoadedConfiguration | null = null;
  private taskStore: TaskStore.TaskStore | null = null;
  private transitionRunner: TransitionRunner.TransitionRunner | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Replaces the settings; missing keys fall back to the process defaults.
   * Drops anything built from earlier settings.
   */
  configure(settings: Partial<CliSettings>): void {
    this.settings = { cwd: process.cwd(), env: process.env, ...settings };
    this.loaded = null;
    this.taskStore = null;
    this.transitionRunner = null;
  }

  getSettings(): CliSettings {
    return this.settings;
  }

  /**
   * @returns Absolute path of the workflow document, or null when none was found
   */
  findConfigPath(): string | null {
    if (this.settings.configPath) {
      return path.resolve(this.settings.cwd, this.settings.configPath);
    }
    return findWorkflowConfig(this.settings.cwd, this.settings.env);
  }

  /**
   * Directory artifact patterns resolve against: the one holding the
   * workflow document (its parent for `.flowgate/workflow.yml`), else cwd.
   */
  getProjectRoot(): string {
    const configPath = this.findConfigPath();
    if (!configPath) {
      return this.settings.cwd;
    }
    const directory = path.dirname(configPath);
    return path.basename(directory) === '.flowgate' ? path.dirname(directory) : directory;
  }

  /**
   * Loads the workflow document and validates its graph.
   *
   * @throws ConfigError when no document is found or it cannot be parsed
   * @throws GraphError when the graph has errors
   */
  async getConfiguration(): Promise<LoadedConfiguration> {
    if (this.loaded) {
      return this.loaded;
    }

    const configPath = this.findConfigPath();
    if (!configPath) {
      throw new ConfigLoader.ConfigError(
        'NOT_FOUND',
        `no ${DEFAULT_CONFIG_FILENAMES.join(', ')} above ${this.settings.cwd} (pass --config or set FLOWGATE_CONFIG)`,
        this.settings.cwd
      );
    }

    const configuration = await loadWorkflowConfig(configPath);
    const warnings = new GraphValidator.GraphValidator().assertValid(configuration);
    for (const warning of warnings) {
      logger.debug(`${warning.code}: ${warning.message}`);
    }

    this.loaded = { path: configPath, configuration, warnings };
    return this.loaded;
  }

  /**
   * Lister rooted at `root`, the project root by default
   */
  getFileLister(root: string = this.getProjectRoot()): FileLister.FileLister {
    return new FsFileLister({ cwd: root });
  }

  getTaskStore(): TaskStore.TaskStore {
    if (!this.taskStore) {
      const tasksDir = this.settings.tasksDir
        ? path.resolve(this.settings.cwd, this.settings.tasksDir)
        : path.join(this.getProjectRoot(), DEFAULT_TASKS_DIR);
      this.taskStore = new FsTaskStore({ tasksDir });
    }
    return this.taskStore;
  }

  getArtifactRegistry(options: ArtifactValidators.ArtifactValidatorOptions = {}): ArtifactValidators.ArtifactValidatorRegistry {
    return ArtifactValidators.createDefaultRegistry(options);
  }

  async getValidationEngine(): Promise<ValidationEngine.ValidationEngine> {
    const { configuration } = await this.getConfiguration();
    return new ValidationEngine.ValidationEngine({
      configuration,
      fileLister: this.getFileLister(),
      validators: this.getArtifactRegistry(),
    });
  }

  async getTransitionRunner(): Promise<TransitionRunner.TransitionRunner> {
    if (this.transitionRunner) {
      return this.transitionRunner;
    }

    const { configuration } = await this.getConfiguration();
    this.transitionRunner = new TransitionRunner.TransitionRunner({
      configuration,
      taskStore: this.getTaskStore(),
      engine: await this.getValidationEngine(),
    });
    return this.transitionRunner;
  }
}
