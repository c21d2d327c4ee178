export { FlowgateError, errorMessage, isErrnoException, isFlowgateError } from "./errors";
export type { ValidationIssue } from "./errors";
