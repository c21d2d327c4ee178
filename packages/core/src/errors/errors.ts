/**
 * Base error for every failure raised by the workflow engine.
 * Subclasses narrow `code` to their own set of values.
 */
export class FlowgateError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A single field-level problem, shared by schema and content validators.
 */
export type ValidationIssue = {
  field: string;
  message: string;
  value: unknown;
};

export function isFlowgateError(error: unknown): error is FlowgateError {
  return error instanceof FlowgateError;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Structural check: fs errors can come from another realm (Jest's VM
 * context), where `instanceof Error` is false.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}
