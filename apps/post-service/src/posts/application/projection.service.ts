import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PostDto } from '@postboard/application';
import type { PostEvent } from '@postboard/domain';
import {
  createPostProjectionDispatcher,
  PostEventCodec,
  ProjectionRunner,
  type ConsumerOffsetStore,
  type PartitionStatus,
} from '@postboard/infrastructure';
import type { Env } from '../../config/env';
import { BusService } from '../../platform/infrastructure/bus/bus.service';
import type { PostReadModel } from '../posts.module';
import { CONSUMER_OFFSETS, POST_READ_MODEL } from '../tokens';

/**
 * Keeps the post read model in step with the event topic for the lifetime of
 * the application context.
 */
@Injectable()
export class ProjectionService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(ProjectionService.name);
  private readonly runner: ProjectionRunner<PostEvent, PostDto>;

  constructor(
    @Inject(ConfigService) config: ConfigService<Env, true>,
    @Inject(BusService) bus: BusService,
    @Inject(POST_READ_MODEL) readModel: PostReadModel,
    @Inject(CONSUMER_OFFSETS) offsets: ConsumerOffsetStore
  ) {
    this.runner = new ProjectionRunner({
      source: bus.source,
      topic: config.get('POST_EVENTS_TOPIC', { infer: true }),
      groupId: config.get('PROJECTION_GROUP_ID', { infer: true }),
      codec: PostEventCodec,
      dispatcher: createPostProjectionDispatcher(readModel),
      offsets,
      fetchTimeoutMs: config.get('FETCH_TIMEOUT_MS', { infer: true }),
      retry: {
        attempts: config.get('PROJECTION_RETRY_ATTEMPTS', { infer: true }),
        baseDelayMs: config.get('PROJECTION_RETRY_BASE_DELAY_MS', {
          infer: true,
        }),
        maxDelayMs: config.get('PROJECTION_RETRY_MAX_DELAY_MS', {
          infer: true,
        }),
      },
    });
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.runner.start();
  }

  /** Runs before the bus and database shut down. */
  async onModuleDestroy(): Promise<void> {
    this.logger.log('Stopping projection');
    await this.runner.stop();
  }

  /** Retry the held message on every paused partition. */
  resume(): void {
    this.runner.resume();
  }

  status(): PartitionStatus[] {
    return this.runner.status();
  }
}
