import { FlowgateError } from '../errors';

export type AssessmentErrorCode = 'INVALID_SCORE' | 'INVALID_ASSESSMENT';

export class AssessmentError extends FlowgateError {
  constructor(message: string, public override readonly code: AssessmentErrorCode) {
    super(message, code);
  }
}
