import { Logger } from '@nestjs/common';
import type { EachMessagePayload, Kafka } from 'kafkajs';
import { AsyncMessageQueue } from './AsyncMessageQueue';
import type {
  BusHeaders,
  BusMessage,
  Delivery,
  MessageChannel,
  PartitionSource,
  Subscription,
} from './types';

type KafkaHeaderValue = Buffer | string | (Buffer | string)[] | undefined;

const headerText = (value: KafkaHeaderValue): string | null => {
  if (value === undefined) return null;
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined ? null : first.toString();
};

const toHeaders = (
  headers: Record<string, KafkaHeaderValue> | undefined
): BusHeaders => {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    const text = headerText(value);
    if (text !== null) result[name] = text;
  }
  return result;
};

export type IncomingMessage = Pick<
  EachMessagePayload,
  'topic' | 'partition' | 'message'
>;

/** Topic to assigned partitions, as handed out on a group join. */
export type GroupAssignment = Readonly<Record<string, readonly number[]>>;

/** The consumer-group calls the source makes. */
export interface GroupConsumer {
  connect(): Promise<void>;
  subscribe(options: { topic: string; fromBeginning: boolean }): Promise<void>;
  run(options: {
    autoCommit: boolean;
    partitionsConsumedConcurrently: number;
    eachMessage: (payload: IncomingMessage) => Promise<void>;
  }): Promise<void>;
  seek(target: { topic: string; partition: number; offset: string }): void;
  pause(targets: Array<{ topic: string; partitions: number[] }>): void;
  onGroupJoin(listener: (assignment: GroupAssignment) => void): void;
  disconnect(): Promise<void>;
}

export interface ConsumerClient {
  partitionsOf(topic: string): Promise<number[]>;
  consumer(groupId: string): GroupConsumer;
}

const kafkaConsumerClient = (kafka: Kafka): ConsumerClient => ({
  async partitionsOf(topic) {
    const admin = kafka.admin();
    await admin.connect();
    try {
      const metadata = await admin.fetchTopicMetadata({ topics: [topic] });
      return (metadata.topics[0]?.partitions ?? []).map(
        (entry) => entry.partitionId
      );
    } finally {
      await admin.disconnect();
    }
  },
  consumer(groupId) {
    const consumer = kafka.consumer({ groupId });
    return {
      connect: () => consumer.connect(),
      subscribe: (options) => consumer.subscribe(options),
      run: (options) => consumer.run(options),
      seek: (target) => consumer.seek(target),
      pause: (targets) => consumer.pause(targets),
      onGroupJoin: (listener) => {
        consumer.on(consumer.events.GROUP_JOIN, ({ payload }) =>
          listener(payload.memberAssignment)
        );
      },
      disconnect: () => consumer.disconnect(),
    };
  },
});

/**
 * Feeds kafkajs partitions into per-partition channels.
 *
 * Broker-side commits are off: progress lives in the consumer offset store,
 * and on every group join the assigned partitions are sought to the stored
 * position. `eachMessage` does not return until the delivery is answered, so
 * kafkajs never runs ahead of the projection loop on a partition.
 */
export class KafkaPartitionSource implements PartitionSource {
  private readonly logger = new Logger(KafkaPartitionSource.name);
  private consumer: GroupConsumer | null = null;
  private readonly queues = new Map<number, AsyncMessageQueue<Delivery>>();
  private readonly unanswered = new Set<() => void>();

  constructor(private readonly client: ConsumerClient) {}

  static fromKafka(kafka: Kafka): KafkaPartitionSource {
    return new KafkaPartitionSource(kafkaConsumerClient(kafka));
  }

  async open(subscription: Subscription): Promise<MessageChannel[]> {
    const { topic, groupId } = subscription;
    const partitions = await this.client.partitionsOf(topic);
    if (partitions.length === 0) {
      throw new Error(
        `Topic ${topic} has no partitions; create it before consuming`
      );
    }

    const consumer = this.client.consumer(groupId);
    this.consumer = consumer;
    for (const partition of partitions) {
      this.queues.set(partition, new AsyncMessageQueue<Delivery>());
    }

    consumer.onGroupJoin((assignment) => {
      const assigned = assignment[topic] ?? [];
      for (const partition of assigned) {
        subscription
          .startOffset(partition)
          .then((offset) => {
            consumer.seek({ topic, partition, offset: String(offset) });
            this.logger.log(`Seeking ${topic}[${partition}] to ${offset}`);
          })
          .catch((error: unknown) => {
            this.logger.error(
              `Could not resolve start offset for ${topic}[${partition}]`,
              error instanceof Error ? error.stack : String(error)
            );
          });
      }
    });

    await consumer.connect();
    await consumer.subscribe({ topic, fromBeginning: true });
    await consumer.run({
      autoCommit: false,
      partitionsConsumedConcurrently: partitions.length,
      eachMessage: (payload) => this.handleMessage(payload),
    });

    return partitions.map<MessageChannel>((partition) => ({
      topic,
      partition,
      take: (timeoutMs, signal) =>
        this.queueFor(partition).take(timeoutMs, signal),
    }));
  }

  async close(): Promise<void> {
    const consumer = this.consumer;
    this.consumer = null;
    this.queues.clear();
    // Release kafkajs; unanswered offsets were never stored, so they are
    // delivered again after the next join.
    for (const release of this.unanswered) release();
    this.unanswered.clear();
    if (consumer) {
      await consumer.disconnect();
    }
  }

  private handleMessage({
    topic,
    partition,
    message,
  }: IncomingMessage): Promise<void> {
    const busMessage: BusMessage = {
      topic,
      partition,
      offset: Number(message.offset),
      key: message.key?.toString() ?? '',
      value: message.value?.toString() ?? '',
      headers: toHeaders(message.headers),
    };
    return new Promise<void>((resolve) => {
      const release = (): void => {
        this.unanswered.delete(release);
        resolve();
      };
      this.unanswered.add(release);
      this.queueFor(partition).push({
        message: busMessage,
        ack: release,
        reject: (error) => {
          this.logger.error(
            `Parking ${topic}[${partition}] at offset ${busMessage.offset}: ${error.message}`
          );
          this.consumer?.pause([{ topic, partitions: [partition] }]);
          release();
        },
      });
    });
  }

  private queueFor(partition: number): AsyncMessageQueue<Delivery> {
    let queue = this.queues.get(partition);
    if (!queue) {
      queue = new AsyncMessageQueue<Delivery>();
      this.queues.set(partition, queue);
    }
    return queue;
  }
}
