/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @flowgate/core/memory for in-memory alternatives.
 */

// FileLister
export { FsFileLister } from './file_lister/fs';
export type { FsFileListerOptions } from './file_lister/fs';

// Workflow document loading and discovery
export {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_FILENAMES,
  DEFAULT_TEMPLATE_PATH,
  findWorkflowConfig,
  initWorkflowConfig,
  loadWorkflowConfig,
} from './config_loader/fs';
export type { LoadWorkflowConfigOptions } from './config_loader/fs';

// TaskStore
export { FsTaskStore } from './task_store/fs';
export type { FsTaskStoreOptions } from './task_store';

// Feature assessment reports
export { writeAssessmentReport } from './workflow_assessor/fs';
