import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EventRepublisher,
  EventSourcedRepository,
  PostCommandHandler,
  PostQueryHandler,
  type EventPublisherPort,
  type EventStorePort,
  type PostReadModelPort,
  type PostDto,
  type PostRepository,
} from '@postboard/application';
import { Post, type PostEvent } from '@postboard/domain';
import {
  EventBusPublisher,
  InMemoryConsumerOffsetStore,
  InMemoryEventStore,
  InMemoryPostReadModel,
  KyselyConsumerOffsetStore,
  KyselyEventStore,
  KyselyPostReadModel,
  PostEventCodec,
  type ConsumerOffsetStore,
  type ProjectionStore,
} from '@postboard/infrastructure';
import type { Env } from '../config/env';
import { BusService } from '../platform/infrastructure/bus/bus.service';
import { DatabaseService } from '../platform/infrastructure/database/database.service';
import {
  CONSUMER_OFFSETS,
  POST_EVENT_PUBLISHER,
  POST_EVENT_STORE,
  POST_READ_MODEL,
  POST_REPOSITORY,
} from './tokens';

export type PostReadModel = PostReadModelPort & ProjectionStore<PostDto>;

const usesPostgres = (config: ConfigService<Env, true>): boolean =>
  config.get('STORAGE_DRIVER', { infer: true }) === 'postgres';

/**
 * Write side, read side and offsets for posts, each backed by Postgres or by
 * process memory depending on `STORAGE_DRIVER`.
 */
@Module({
  providers: [
    {
      provide: POST_EVENT_STORE,
      inject: [ConfigService, DatabaseService],
      useFactory: (
        config: ConfigService<Env, true>,
        database: DatabaseService
      ): EventStorePort<PostEvent> =>
        usesPostgres(config)
          ? new KyselyEventStore(database.getDb(), PostEventCodec)
          : new InMemoryEventStore<PostEvent>(),
    },
    {
      provide: POST_READ_MODEL,
      inject: [ConfigService, DatabaseService],
      useFactory: (
        config: ConfigService<Env, true>,
        database: DatabaseService
      ): PostReadModel =>
        usesPostgres(config)
          ? new KyselyPostReadModel(database.getDb())
          : new InMemoryPostReadModel(),
    },
    {
      provide: CONSUMER_OFFSETS,
      inject: [ConfigService, DatabaseService],
      useFactory: (
        config: ConfigService<Env, true>,
        database: DatabaseService
      ): ConsumerOffsetStore =>
        usesPostgres(config)
          ? new KyselyConsumerOffsetStore(database.getDb())
          : new InMemoryConsumerOffsetStore(),
    },
    {
      provide: POST_EVENT_PUBLISHER,
      inject: [ConfigService, BusService],
      useFactory: (
        config: ConfigService<Env, true>,
        bus: BusService
      ): EventPublisherPort<PostEvent> =>
        new EventBusPublisher(
          bus.producer,
          config.get('POST_EVENTS_TOPIC', { infer: true }),
          PostEventCodec
        ),
    },
    {
      provide: POST_REPOSITORY,
      inject: [POST_EVENT_STORE, POST_EVENT_PUBLISHER],
      useFactory: (
        eventStore: EventStorePort<PostEvent>,
        publisher: EventPublisherPort<PostEvent>
      ): PostRepository =>
        new EventSourcedRepository(eventStore, publisher, Post.rehydrate),
    },
    {
      provide: PostCommandHandler,
      inject: [POST_REPOSITORY, ConfigService],
      useFactory: (
        posts: PostRepository,
        config: ConfigService<Env, true>
      ) =>
        new PostCommandHandler(posts, {
          maxAttempts: config.get('COMMAND_MAX_ATTEMPTS', { infer: true }),
        }),
    },
    {
      provide: PostQueryHandler,
      inject: [POST_READ_MODEL],
      useFactory: (readModel: PostReadModelPort) =>
        new PostQueryHandler(readModel),
    },
    {
      provide: EventRepublisher,
      inject: [POST_EVENT_STORE, POST_EVENT_PUBLISHER],
      useFactory: (
        eventStore: EventStorePort<PostEvent>,
        publisher: EventPublisherPort<PostEvent>
      ) => new EventRepublisher(eventStore, publisher),
    },
  ],
  exports: [
    PostCommandHandler,
    PostQueryHandler,
    EventRepublisher,
    POST_READ_MODEL,
    CONSUMER_OFFSETS,
  ],
})
export class PostsModule {}
