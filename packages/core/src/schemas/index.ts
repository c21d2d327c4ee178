import workflowConfigSchema from "./workflow_config.schema.json";

export { SchemaValidationCache, toValidationIssues } from "./schema_cache";

/**
 * Structural schema of the workflow configuration document.
 */
export const WorkflowConfigSchema: Record<string, unknown> = workflowConfigSchema;
