import { ApplicationError } from './ApplicationError';

/**
 * Bus or store temporarily unavailable. Safe to retry with backoff.
 */
export class TransientInfrastructureError extends ApplicationError {
  constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message, 'transient_infrastructure');
    this.name = 'TransientInfrastructureError';
  }
}
