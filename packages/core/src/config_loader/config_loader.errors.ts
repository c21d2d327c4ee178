import { FlowgateError } from '../errors';
import type { ValidationIssue } from '../errors';

export type ConfigErrorKind = 'NOT_FOUND' | 'MALFORMED' | 'SCHEMA_VIOLATION';

const KIND_LABELS: Record<ConfigErrorKind, string> = {
  NOT_FOUND: 'Workflow document not found',
  MALFORMED: 'Malformed workflow document',
  SCHEMA_VIOLATION: 'Schema violation',
};

/**
 * The workflow document could not be turned into a Configuration.
 * Raised before any graph work happens.
 */
export class ConfigError extends FlowgateError {
  constructor(
    public readonly kind: ConfigErrorKind,
    public readonly detail: string,
    /** JSON pointer of the offending value, or the file path for NOT_FOUND */
    public readonly location: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(`${KIND_LABELS[kind]} at ${location || '/'}: ${detail}`, kind);
  }
}
