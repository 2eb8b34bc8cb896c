import { ApplicationError } from './ApplicationError';

/**
 * The stream moved on since it was loaded. Reload, replay and retry.
 */
export class ConcurrencyError extends ApplicationError {
  constructor(
    message = 'Concurrency conflict',
    readonly details?: Readonly<{
      aggregateId: string;
      expectedVersion: number;
      actualVersion?: number;
    }>
  ) {
    super(message, 'concurrency_conflict');
    this.name = 'ConcurrencyError';
  }
}
