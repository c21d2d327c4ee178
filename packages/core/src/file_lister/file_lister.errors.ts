import { FlowgateError } from "../errors";

export type FileListerErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'PERMISSION_DENIED'
  | 'INVALID_PATH';

/**
 * Error thrown when a file operation fails.
 */
export class FileListerError extends FlowgateError {
  constructor(
    message: string,
    public override readonly code: FileListerErrorCode,
    public readonly filePath?: string
  ) {
    super(message, code);
  }
}
