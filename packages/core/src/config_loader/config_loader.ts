import * as yaml from 'js-yaml';
import type { ValidateFunction } from 'ajv';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import { SchemaValidationCache, WorkflowConfigSchema, toValidationIssues } from '../schemas';
import { ConfigurationBuilder } from '../workflow_model';
import type { Configuration, ValidationMode } from '../workflow_model';
import { ConfigError } from './config_loader.errors';
import type {
  DocumentArtifact,
  DocumentValidation,
  ParseWorkflowConfigOptions,
  WorkflowDocument,
} from './config_loader.types';

const logger = createLogger('[ConfigLoader] ');

function getDocumentValidator(schemaPath?: string): ValidateFunction {
  if (!schemaPath) {
    return SchemaValidationCache.getValidatorFromSchema(WorkflowConfigSchema);
  }
  try {
    return SchemaValidationCache.getValidator(schemaPath);
  } catch (error) {
    throw new ConfigError('MALFORMED', `Cannot load schema: ${errorMessage(error)}`, schemaPath);
  }
}

function isWorkflowDocument(value: unknown, validate: ValidateFunction): value is WorkflowDocument {
  return validate(value);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toValidationMode(validation: DocumentValidation | undefined): string | ValidationMode | undefined {
  if (validation === undefined || typeof validation === 'string') return validation;

  switch (validation.mode) {
    case 'none':
      return { kind: 'none' };
    case 'pull_request':
      return { kind: 'pull_request' };
    case 'keyword':
      return { kind: 'keyword', keyword: validation.keyword ?? '' };
  }
}

function toArtifactInputs(artifacts: DocumentArtifact[] | undefined) {
  return (artifacts ?? []).map(artifact => ({
    type: artifact.type,
    path: artifact.path,
    ...(artifact.required !== undefined && { required: artifact.required }),
    ...(artifact.multiple !== undefined && { multiple: artifact.multiple }),
  }));
}

/**
 * Parses a YAML or JSON workflow document, checks it against the structural
 * schema and builds the typed Configuration.
 *
 * Only structure is checked here; whether the graph makes sense is the
 * graph validator's job.
 *
 * @throws ConfigError MALFORMED when the text cannot be parsed
 * @throws ConfigError SCHEMA_VIOLATION when the structure is wrong
 */
export function parseWorkflowConfig(content: string, options: ParseWorkflowConfigOptions = {}): Configuration {
  const source = options.source ?? '<inline>';

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: source });
  } catch (error) {
    throw new ConfigError('MALFORMED', errorMessage(error), source);
  }

  if (!isMapping(raw)) {
    throw new ConfigError('MALFORMED', 'Document root must be a mapping', source);
  }

  const validate = getDocumentValidator(options.schemaPath);
  if (!isWorkflowDocument(raw, validate)) {
    const issues = toValidationIssues(validate.errors);
    const first = issues[0];
    throw new ConfigError(
      'SCHEMA_VIOLATION',
      first ? `${first.message}${issues.length > 1 ? ` (+${issues.length - 1} more)` : ''}` : 'Document does not match the workflow schema',
      first?.field ?? '/',
      issues
    );
  }

  const configuration = buildConfiguration(raw, options.source ?? null);
  logger.debug(
    `Loaded ${source}: ${configuration.states.length} states, ${configuration.transitions.length} transitions, ${configuration.workflows.length} workflows`
  );
  return configuration;
}

/**
 * Turns a structurally valid document into a Configuration.
 */
export function buildConfiguration(document: WorkflowDocument, source: string | null = null): Configuration {
  const builder = new ConfigurationBuilder({
    ...(document.version !== undefined && { version: String(document.version) }),
    ...(document.description !== undefined && { description: document.description }),
    source,
  });

  for (const state of document.states) {
    builder.addState(state);
  }

  for (const [name, workflow] of Object.entries(document.workflows)) {
    builder.addWorkflow({ name, ...workflow });
  }

  for (const transition of document.transitions) {
    const validation = toValidationMode(transition.validation);
    builder.addTransition({
      from: transition.from,
      to: transition.to,
      via: transition.via,
      ...(transition.name !== undefined && { name: transition.name }),
      ...(transition.description !== undefined && { description: transition.description }),
      ...(validation !== undefined && { validation }),
      inputArtifacts: toArtifactInputs(transition.input_artifacts),
      outputArtifacts: toArtifactInputs(transition.output_artifacts),
    });
  }

  if (document.initial_states) {
    builder.setInitialStates(document.initial_states);
  }
  if (document.agent_loops) {
    builder.setAgentLoops(document.agent_loops);
  }
  if (document.known_agents) {
    builder.addKnownAgents(document.known_agents);
  }
  if (document.policy?.acceptance_criteria) {
    builder.setAcceptanceCriteriaPolicy(document.policy.acceptance_criteria);
  }

  return builder.build();
}
