// Database
export * from './database/database.types';
export * from './database/errors';
export * from './database/schema';

// Eventing
export * from './eventing/types';
export * from './eventstore/InMemoryEventStore';
export * from './eventstore/KyselyEventStore';

// Bus
export * from './bus/types';
export * from './bus/AsyncMessageQueue';
export * from './bus/EventBusPublisher';
export * from './bus/InMemoryEventBus';
export * from './bus/KafkaBusProducer';
export * from './bus/KafkaPartitionSource';

// Projection
export * from './projection/types';
export * from './projection/handlers';
export * from './projection/retry';
export * from './projection/ConsumerOffsetStore';
export * from './projection/KyselyConsumerOffsetStore';
export * from './projection/ProjectionDispatcher';
export * from './projection/ProjectionConsumer';
export * from './projection/ProjectionRunner';

// Posts
export * from './posts/PostEventCodec';
export * from './posts/PostProjection';
export * from './posts/InMemoryPostReadModel';
export * from './posts/KyselyPostReadModel';
