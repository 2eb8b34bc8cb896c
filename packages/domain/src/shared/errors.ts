/**
 * Business-rule failure raised before any event is produced.
 */
export class DomainError extends Error {
  constructor(
    message: string,
    readonly code: string = 'domain_error'
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export class InvalidArgumentError extends DomainError {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message, 'invalid_argument');
    this.name = 'InvalidArgumentError';
  }
}

export class UnauthorizedError extends DomainError {
  constructor(message = 'Operation not allowed for this user') {
    super(message, 'unauthorized');
    this.name = 'UnauthorizedError';
  }
}

export class InactiveAggregateError extends DomainError {
  constructor(readonly aggregateId: string) {
    super(`Aggregate ${aggregateId} is inactive`, 'inactive_aggregate');
    this.name = 'InactiveAggregateError';
  }
}

export class CommentNotFoundError extends DomainError {
  constructor(readonly commentId: string) {
    super(`Comment ${commentId} does not exist`, 'comment_not_found');
    this.name = 'CommentNotFoundError';
  }
}

/**
 * Misuse of the aggregate lifecycle (replaying twice, foreign events).
 */
export class InvariantViolationError extends DomainError {
  constructor(message: string) {
    super(message, 'invariant_violation');
    this.name = 'InvariantViolationError';
  }
}

/**
 * Store and consumer disagree on the event schema. Never recoverable by retry.
 */
export class FatalSchemaError extends Error {
  readonly code: string = 'fatal_schema';

  constructor(message: string) {
    super(message);
    this.name = 'FatalSchemaError';
  }
}

export class UnknownEventTypeError extends FatalSchemaError {
  constructor(readonly eventType: string) {
    super(`Unknown event type '${eventType}'`);
    this.name = 'UnknownEventTypeError';
  }
}

export const describeEventType = (event: unknown): string => {
  if (typeof event === 'object' && event !== null && 'eventType' in event) {
    return String(event.eventType);
  }
  return typeof event;
};

/**
 * Exhaustiveness guard for switches over event unions.
 */
export const unknownEventType = (event: never): never => {
  throw new UnknownEventTypeError(describeEventType(event));
};
