export type BusHeaders = Readonly<Record<string, string>>;

export type OutgoingMessage = Readonly<{
  key: string;
  value: string;
  headers: BusHeaders;
}>;

export type BusMessage = OutgoingMessage &
  Readonly<{
    topic: string;
    partition: number;
    offset: number;
  }>;

/**
 * A fetched message the consumer still owes an answer for. `ack` once its
 * offset is committed; `reject` when it can never be processed.
 */
export type Delivery = Readonly<{
  message: BusMessage;
  ack(): void;
  reject(error: Error): void;
}>;

/**
 * Ordered feed of one topic partition.
 */
export interface MessageChannel {
  readonly topic: string;
  readonly partition: number;
  /**
   * Resolves with the next delivery, or null once `timeoutMs` passes or
   * `signal` aborts. Only the calling loop waits.
   */
  take(timeoutMs: number, signal: AbortSignal): Promise<Delivery | null>;
}

export type Subscription = Readonly<{
  topic: string;
  groupId: string;
  /** First offset to deliver for `partition`. */
  startOffset(partition: number): Promise<number>;
}>;

export interface PartitionSource {
  open(subscription: Subscription): Promise<MessageChannel[]>;
  close(): Promise<void>;
}

export interface BusProducer {
  send(topic: string, messages: readonly OutgoingMessage[]): Promise<void>;
  close(): Promise<void>;
}
