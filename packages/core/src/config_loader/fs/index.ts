export {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_FILENAMES,
  DEFAULT_TEMPLATE_PATH,
  findWorkflowConfig,
  initWorkflowConfig,
  loadWorkflowConfig,
} from './fs_config_loader';
export type { LoadWorkflowConfigOptions } from './fs_config_loader';
