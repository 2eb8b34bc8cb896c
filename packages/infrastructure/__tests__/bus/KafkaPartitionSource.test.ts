import { describe, expect, it, vi } from 'vitest';
import type { IHeaders } from 'kafkajs';
import type { PostDto } from '@postboard/application';
import type { PostEvent } from '@postboard/domain';
import {
  KafkaPartitionSource,
  type ConsumerClient,
  type GroupAssignment,
  type GroupConsumer,
  type IncomingMessage,
} from '../../src/bus/KafkaPartitionSource';
import { InMemoryPostReadModel } from '../../src/posts/InMemoryPostReadModel';
import { PostEventCodec } from '../../src/posts/PostEventCodec';
import { createPostProjectionDispatcher } from '../../src/posts/PostProjection';
import { InMemoryConsumerOffsetStore } from '../../src/projection/ConsumerOffsetStore';
import { ProjectionRunner } from '../../src/projection/ProjectionRunner';

const TOPIC = 'post-events';

type Seek = { topic: string; partition: number; offset: string };
type PauseTarget = { topic: string; partitions: number[] };
type RunOptions = {
  autoCommit: boolean;
  partitionsConsumedConcurrently: number;
  eachMessage: (payload: IncomingMessage) => Promise<void>;
};
type RawMessage = {
  offset: string;
  key?: Buffer | null;
  value?: Buffer | null;
  headers?: IHeaders;
};

class FakeGroupConsumer implements GroupConsumer {
  readonly seeks: Seek[] = [];
  readonly paused: PauseTarget[] = [];
  subscribed: { topic: string; fromBeginning: boolean } | null = null;
  runOptions: RunOptions | null = null;
  disconnected = false;
  private readonly joinListeners: Array<(assignment: GroupAssignment) => void> =
    [];

  async connect(): Promise<void> {}

  async subscribe(options: {
    topic: string;
    fromBeginning: boolean;
  }): Promise<void> {
    this.subscribed = options;
  }

  async run(options: RunOptions): Promise<void> {
    this.runOptions = options;
  }

  seek(target: Seek): void {
    this.seeks.push(target);
  }

  pause(targets: PauseTarget[]): void {
    this.paused.push(...targets);
  }

  onGroupJoin(listener: (assignment: GroupAssignment) => void): void {
    this.joinListeners.push(listener);
  }

  async disconnect(): Promise<void> {
    this.disconnected = true;
  }

  join(assignment: GroupAssignment): void {
    for (const listener of this.joinListeners) listener(assignment);
  }

  /** Hands a message to `eachMessage` the way kafkajs would. */
  deliver(partition: number, raw: RawMessage): Promise<void> {
    if (!this.runOptions) throw new Error('consumer is not running');
    return this.runOptions.eachMessage({
      topic: TOPIC,
      partition,
      message: {
        key: raw.key === undefined ? Buffer.from('post-1') : raw.key,
        value: raw.value === undefined ? Buffer.from('payload') : raw.value,
        timestamp: '0',
        attributes: 0,
        offset: raw.offset,
        headers: raw.headers ?? {},
      },
    });
  }
}

class FakeConsumerClient implements ConsumerClient {
  readonly consumers: FakeGroupConsumer[] = [];

  constructor(private readonly partitions: number[]) {}

  async partitionsOf(): Promise<number[]> {
    return this.partitions;
  }

  consumer(): FakeGroupConsumer {
    const consumer = new FakeGroupConsumer();
    this.consumers.push(consumer);
    return consumer;
  }
}

const openSource = async (partitions: number[] = [0, 1]) => {
  const client = new FakeConsumerClient(partitions);
  const source = new KafkaPartitionSource(client);
  const channels = await source.open({
    topic: TOPIC,
    groupId: 'g',
    startOffset: async () => 0,
  });
  const consumer = client.consumers[0];
  if (!consumer) throw new Error('no consumer was created');
  return { source, channels, consumer };
};

const signal = new AbortController().signal;

describe('KafkaPartitionSource', () => {
  it('opens one channel per topic partition with broker commits off', async () => {
    const { source, channels, consumer } = await openSource([0, 1, 2]);

    expect(channels.map((channel) => [channel.topic, channel.partition])).toEqual(
      [
        [TOPIC, 0],
        [TOPIC, 1],
        [TOPIC, 2],
      ]
    );
    expect(consumer.subscribed).toEqual({ topic: TOPIC, fromBeginning: true });
    expect(consumer.runOptions?.autoCommit).toBe(false);
    expect(consumer.runOptions?.partitionsConsumedConcurrently).toBe(3);
    await source.close();
  });

  it('refuses a topic without partitions', async () => {
    const client = new FakeConsumerClient([]);
    const source = new KafkaPartitionSource(client);

    await expect(
      source.open({ topic: TOPIC, groupId: 'g', startOffset: async () => 0 })
    ).rejects.toThrow(
      'Topic post-events has no partitions; create it before consuming'
    );
    expect(client.consumers).toHaveLength(0);
  });

  it('seeks each assigned partition past its stored offset on join', async () => {
    const client = new FakeConsumerClient([0, 1]);
    const offsets = new InMemoryConsumerOffsetStore();
    await offsets.commit(
      { groupId: 'posts-projection', topic: TOPIC, partition: 1 },
      6
    );
    const runner = new ProjectionRunner<PostEvent, PostDto>({
      source: new KafkaPartitionSource(client),
      topic: TOPIC,
      groupId: 'posts-projection',
      codec: PostEventCodec,
      dispatcher: createPostProjectionDispatcher(new InMemoryPostReadModel()),
      offsets,
      fetchTimeoutMs: 20,
      retry: { attempts: 2, baseDelayMs: 1, maxDelayMs: 2 },
    });
    await runner.start();
    const consumer = client.consumers[0];

    consumer?.join({ [TOPIC]: [0, 1], 'other-topic': [3] });

    await vi.waitFor(() => expect(consumer?.seeks).toHaveLength(2));
    expect(consumer?.seeks).toEqual(
      expect.arrayContaining([
        { topic: TOPIC, partition: 0, offset: '0' },
        { topic: TOPIC, partition: 1, offset: '7' },
      ])
    );
    await runner.stop();
    expect(consumer?.disconnected).toBe(true);
  });

  it('holds eachMessage until the delivery is acked', async () => {
    const { source, channels, consumer } = await openSource();
    let settled = false;

    const handled = consumer
      .deliver(1, {
        offset: '7',
        headers: {
          'event-type': Buffer.from('PostLiked'),
          trace: ['first', Buffer.from('second')],
          missing: undefined,
          empty: [],
        },
      })
      .then(() => {
        settled = true;
      });
    const delivery = await channels[1]?.take(100, signal);

    expect(delivery?.message).toEqual({
      topic: TOPIC,
      partition: 1,
      offset: 7,
      key: 'post-1',
      value: 'payload',
      headers: { 'event-type': 'PostLiked', trace: 'first' },
    });
    await Promise.resolve();
    expect(settled).toBe(false);

    delivery?.ack();
    await handled;
    expect(settled).toBe(true);
    expect(consumer.paused).toEqual([]);
    await source.close();
  });

  it('reads a message without key or value as empty text', async () => {
    const { source, channels, consumer } = await openSource();

    const handled = consumer.deliver(0, { offset: '0', key: null, value: null });
    const delivery = await channels[0]?.take(100, signal);

    expect(delivery?.message).toEqual({
      topic: TOPIC,
      partition: 0,
      offset: 0,
      key: '',
      value: '',
      headers: {},
    });
    delivery?.ack();
    await handled;
    await source.close();
  });

  it('pauses the partition when a delivery is rejected', async () => {
    const { source, channels, consumer } = await openSource();

    const handled = consumer.deliver(0, { offset: '3' });
    const delivery = await channels[0]?.take(100, signal);
    delivery?.reject(new Error('read model unavailable'));
    await handled;

    expect(consumer.paused).toEqual([{ topic: TOPIC, partitions: [0] }]);
    await source.close();
  });

  it('releases unanswered deliveries on close', async () => {
    const { source, channels, consumer } = await openSource();

    const handled = consumer.deliver(1, { offset: '4' });
    await channels[1]?.take(100, signal);
    await source.close();

    await expect(handled).resolves.toBeUndefined();
    expect(consumer.disconnected).toBe(true);
  });
});
