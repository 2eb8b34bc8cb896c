import { Logger } from '@nestjs/common';
import type { DomainEvent } from '@postboard/domain';
import type { PartitionSource } from '../bus/types';
import type { EventCodec } from '../eventing/types';
import type { ConsumerOffsetStore } from './ConsumerOffsetStore';
import { ProjectionConsumer, type ConsumerState } from './ProjectionConsumer';
import type { ProjectionDispatcher } from './ProjectionDispatcher';
import type { RetryPolicy } from './retry';
import type { VersionedView } from './types';

export type ProjectionRunnerOptions<
  TEvent extends DomainEvent,
  TView extends VersionedView,
> = Readonly<{
  source: PartitionSource;
  topic: string;
  groupId: string;
  codec: EventCodec<TEvent>;
  dispatcher: ProjectionDispatcher<TEvent, TView>;
  offsets: ConsumerOffsetStore;
  fetchTimeoutMs: number;
  retry: RetryPolicy;
}>;

export type PartitionStatus = Readonly<{
  partition: number;
  state: ConsumerState;
  processed: number;
  heldOffset: number | null;
}>;

/**
 * One ProjectionConsumer per partition, each resuming from its own stored
 * offset. Partitions progress independently.
 */
export class ProjectionRunner<
  TEvent extends DomainEvent,
  TView extends VersionedView,
> {
  private readonly logger = new Logger(ProjectionRunner.name);
  private consumers: ProjectionConsumer<TEvent, TView>[] = [];
  private running = false;

  constructor(
    private readonly options: ProjectionRunnerOptions<TEvent, TView>
  ) {}

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const { source, topic, groupId, offsets } = this.options;
    const channels = await source.open({
      topic,
      groupId,
      startOffset: async (partition) => {
        const committed = await offsets.get({ groupId, topic, partition });
        return committed === null ? 0 : committed + 1;
      },
    });
    this.consumers = channels.map(
      (channel) =>
        new ProjectionConsumer({
          groupId,
          channel,
          codec: this.options.codec,
          dispatcher: this.options.dispatcher,
          offsets,
          fetchTimeoutMs: this.options.fetchTimeoutMs,
          retry: this.options.retry,
        })
    );
    for (const consumer of this.consumers) {
      consumer.start();
    }
    this.logger.log(
      `Projecting ${topic} as ${groupId} over ${this.consumers.length} partition(s)`
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await Promise.all(this.consumers.map((consumer) => consumer.stop()));
    await this.options.source.close();
    this.logger.log(`Stopped projecting ${this.options.topic}`);
  }

  /** Retry the held message on every paused partition. */
  resume(): void {
    for (const consumer of this.consumers) {
      consumer.resume();
    }
  }

  status(): PartitionStatus[] {
    return this.consumers.map((consumer) => ({
      partition: consumer.partition,
      state: consumer.state,
      processed: consumer.processed,
      heldOffset: consumer.heldOffset,
    }));
  }
}
