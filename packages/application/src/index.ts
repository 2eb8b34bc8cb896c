export * from './errors/ApplicationError';
export * from './errors/ConcurrencyError';
export * from './errors/NotFoundError';
export * from './errors/TransientInfrastructureError';
export * from './errors/ValidationError';

export * from './shared/ports/CommandResult';
export * from './shared/ports/cqrsTypes';
export * from './shared/ports/EventPublisherPort';
export * from './shared/ports/EventStorePort';
export * from './shared/ports/types';
export * from './shared/ports/BaseCommandHandler';
export * from './shared/EventSourcedRepository';
export * from './shared/EventRepublisher';

export * from './posts/commands';
export * from './posts/queries';
export * from './posts/dtos';
export * from './posts/ports/PostReadModelPort';
export * from './posts/PostCommandHandler';
export * from './posts/PostQueryHandler';
