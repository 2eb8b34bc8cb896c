import { ApplicationError } from './ApplicationError';

/** Raised when an aggregate has no stored events. */
export class NotFoundError extends ApplicationError {
  constructor(
    readonly aggregateId: string,
    message = `No stream for ${aggregateId}`
  ) {
    super(message, 'not_found');
    this.name = 'NotFoundError';
  }
}
