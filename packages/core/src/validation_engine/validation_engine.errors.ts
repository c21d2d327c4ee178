import { FlowgateError } from '../errors';
import type { GateReason, GateResult } from './validation_engine.types';

/**
 * A transition was denied. Recoverable: the caller performs the missing
 * action (create the artifact, supply approval) and tries again.
 */
export class GateFailure extends FlowgateError {
  public readonly reasons: GateReason[];

  constructor(public readonly result: GateResult) {
    const fatal = result.reasons.filter(reason => reason.severity === 'fatal');
    const lines = fatal.map(reason => `  - [${reason.code}] ${reason.message}`).join('\n');
    super(
      `Transition '${result.transition.name}' denied for task ${result.taskId}:\n${lines}`,
      'GATE_FAILED'
    );
    this.reasons = fatal;
  }
}
