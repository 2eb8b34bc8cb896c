// Shared
export * from './shared/DomainEvent';
export * from './shared/Entity';
export * from './shared/AggregateRoot';
export * from './shared/Assert';
export * from './shared/errors';

// Posts
export * from './posts/events/eventTypes';
export * from './posts/events/PostEvents';
export * from './posts/PostState';
export * from './posts/Post';
