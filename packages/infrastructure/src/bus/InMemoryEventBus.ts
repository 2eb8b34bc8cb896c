import { TransientInfrastructureError } from '@postboard/application';
import { AsyncMessageQueue } from './AsyncMessageQueue';
import type {
  BusMessage,
  BusProducer,
  Delivery,
  MessageChannel,
  OutgoingMessage,
  PartitionSource,
  Subscription,
} from './types';

/**
 * FNV-1a over the key's UTF-16 code units.
 */
export const partitionFor = (key: string, partitions: number): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % partitions;
};

type OpenChannel = MessageChannel &
  Readonly<{ groupId: string; queue: AsyncMessageQueue<Delivery> }>;

type Rejection = Readonly<{ message: BusMessage; error: Error }>;

const ANSWER_HISTORY = 1_000;

const remember = <T>(history: T[], entry: T): void => {
  history.push(entry);
  if (history.length > ANSWER_HISTORY) history.shift();
};

/**
 * Partitioned, append-only log held in memory. Messages with the same key
 * land on the same partition and keep their send order there.
 */
export class InMemoryEventBus implements BusProducer, PartitionSource {
  private readonly logs = new Map<string, BusMessage[][]>();
  private channels: OpenChannel[] = [];
  private failNextWith: Error | null = null;
  /** The most recent acknowledgements, oldest first. */
  readonly acked: BusMessage[] = [];
  readonly rejected: Rejection[] = [];

  constructor(readonly partitions = 3) {
    if (!Number.isInteger(partitions) || partitions < 1) {
      throw new RangeError(`partitions must be a positive integer`);
    }
  }

  async send(
    topic: string,
    messages: readonly OutgoingMessage[]
  ): Promise<void> {
    if (this.failNextWith) {
      const error = this.failNextWith;
      this.failNextWith = null;
      throw new TransientInfrastructureError(error.message, error);
    }
    const log = this.logFor(topic);
    for (const outgoing of messages) {
      const partition = partitionFor(outgoing.key, this.partitions);
      const entries = log[partition] ?? [];
      const message: BusMessage = {
        ...outgoing,
        topic,
        partition,
        offset: entries.length,
      };
      entries.push(message);
      log[partition] = entries;
      for (const channel of this.channels) {
        if (channel.topic === topic && channel.partition === partition) {
          channel.queue.push(this.deliver(message));
        }
      }
    }
  }

  async open(subscription: Subscription): Promise<MessageChannel[]> {
    return this.attach(subscription);
  }

  /** Drops the channels of every subscriber. */
  async close(): Promise<void> {
    this.channels = [];
  }

  /**
   * A partition source over this bus whose `close` detaches only the
   * channels it opened.
   */
  subscriber(): PartitionSource {
    let opened: OpenChannel[] = [];
    return {
      open: async (subscription) => {
        const channels = await this.attach(subscription);
        opened = [...opened, ...channels];
        return channels;
      },
      close: async () => {
        const closing = new Set(opened);
        opened = [];
        this.channels = this.channels.filter(
          (channel) => !closing.has(channel)
        );
      },
    };
  }

  /** Everything sent to `topic`, per partition. */
  messages(topic: string): readonly (readonly BusMessage[])[] {
    return this.logFor(topic);
  }

  failNext(error: Error): void {
    this.failNextWith = error;
  }

  private async attach(subscription: Subscription): Promise<OpenChannel[]> {
    const log = this.logFor(subscription.topic);
    const opened: OpenChannel[] = [];
    for (let partition = 0; partition < this.partitions; partition++) {
      const start = await subscription.startOffset(partition);
      const queue = new AsyncMessageQueue<Delivery>();
      for (const message of (log[partition] ?? []).slice(start)) {
        queue.push(this.deliver(message));
      }
      opened.push({
        topic: subscription.topic,
        partition,
        groupId: subscription.groupId,
        queue,
        take: (timeoutMs, signal) => queue.take(timeoutMs, signal),
      });
    }
    this.channels = [...this.channels, ...opened];
    return opened;
  }

  private logFor(topic: string): BusMessage[][] {
    let log = this.logs.get(topic);
    if (!log) {
      log = Array.from({ length: this.partitions }, () => []);
      this.logs.set(topic, log);
    }
    return log;
  }

  private deliver(message: BusMessage): Delivery {
    return {
      message,
      ack: () => {
        remember(this.acked, message);
      },
      reject: (error) => {
        remember(this.rejected, { message, error });
      },
    };
  }
}
