import { FlowgateError } from '../errors';

/**
 * No transition of the configuration is performed by the requested
 * command.
 */
export class TransitionNotFoundError extends FlowgateError {
  constructor(
    public readonly via: string,
    public readonly currentState: string,
    public readonly availableCommands: string[]
  ) {
    const available = availableCommands.length ? availableCommands.join(', ') : 'none';
    super(
      `No transition '${via}' is configured (task is in '${currentState}'; available: ${available})`,
      'TRANSITION_NOT_FOUND'
    );
  }
}
