export type PartitionKey = Readonly<{
  groupId: string;
  topic: string;
  partition: number;
}>;

/**
 * Last bus offset whose projection update succeeded, per consumer group
 * partition. Written only after the read model is updated.
 */
export interface ConsumerOffsetStore {
  get(key: PartitionKey): Promise<number | null>;
  commit(key: PartitionKey, offset: number): Promise<void>;
}

const keyOf = ({ groupId, topic, partition }: PartitionKey): string =>
  `${groupId}\u0000${topic}\u0000${partition}`;

export class InMemoryConsumerOffsetStore implements ConsumerOffsetStore {
  private readonly offsets = new Map<string, number>();

  async get(key: PartitionKey): Promise<number | null> {
    return this.offsets.get(keyOf(key)) ?? null;
  }

  async commit(key: PartitionKey, offset: number): Promise<void> {
    const current = this.offsets.get(keyOf(key));
    if (current !== undefined && current >= offset) return;
    this.offsets.set(keyOf(key), offset);
  }
}
