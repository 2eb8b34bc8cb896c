import { Logger } from '@nestjs/common';
import { FatalSchemaError, type DomainEvent } from '@postboard/domain';
import type { Delivery, MessageChannel } from '../bus/types';
import type { EventCodec } from '../eventing/types';
import type { ConsumerOffsetStore, PartitionKey } from './ConsumerOffsetStore';
import type { ProjectionDispatcher } from './ProjectionDispatcher';
import {
  RetryBudgetExhaustedError,
  retryWithBackoff,
  type RetryPolicy,
} from './retry';
import type { VersionedView } from './types';

export const ConsumerStates = {
  idle: 'idle',
  subscribed: 'subscribed',
  paused: 'paused',
  stopped: 'stopped',
  failed: 'failed',
} as const;

export type ConsumerState =
  (typeof ConsumerStates)[keyof typeof ConsumerStates];

export type ProjectionConsumerOptions<
  TEvent extends DomainEvent,
  TView extends VersionedView,
> = Readonly<{
  groupId: string;
  channel: MessageChannel;
  codec: EventCodec<TEvent>;
  dispatcher: ProjectionDispatcher<TEvent, TView>;
  offsets: ConsumerOffsetStore;
  fetchTimeoutMs: number;
  retry: RetryPolicy;
}>;

type StepResult = 'done' | 'paused' | 'failed' | 'aborted';

const isAbort = (error: unknown): boolean =>
  error instanceof Error && error.name === 'AbortError';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Sequential projection loop over one partition:
 * fetch → decode → dispatch → commit offset → ack.
 *
 * Schema errors are fatal (state `failed`). Anything else thrown by dispatch
 * or commit is retried with backoff; when the budget runs out the message is
 * held and the loop is `paused` until `resume()`. `stop()` aborts a pending
 * fetch or backoff but never interrupts a dispatch or commit in flight.
 */
export class ProjectionConsumer<
  TEvent extends DomainEvent,
  TView extends VersionedView,
> {
  private readonly logger: Logger;
  private readonly key: PartitionKey;
  private _state: ConsumerState = ConsumerStates.idle;
  private abort = new AbortController();
  private loop: Promise<void> | null = null;
  private held: Delivery | null = null;
  private wake: (() => void) | null = null;
  private _lastError: Error | null = null;
  private _processed = 0;

  constructor(
    private readonly options: ProjectionConsumerOptions<TEvent, TView>
  ) {
    const { groupId, channel } = options;
    this.key = { groupId, topic: channel.topic, partition: channel.partition };
    this.logger = new Logger(
      `${ProjectionConsumer.name}:${channel.topic}[${channel.partition}]`
    );
  }

  get state(): ConsumerState {
    return this._state;
  }

  get partition(): number {
    return this.key.partition;
  }

  /** Messages fully processed (applied or skipped) since start. */
  get processed(): number {
    return this._processed;
  }

  get lastError(): Error | null {
    return this._lastError;
  }

  /** Offset of the message held while paused. */
  get heldOffset(): number | null {
    return this.held?.message.offset ?? null;
  }

  start(): void {
    if (this._state !== ConsumerStates.idle) {
      throw new Error(`Cannot start consumer in state ${this._state}`);
    }
    this.abort = new AbortController();
    this._state = ConsumerStates.subscribed;
    this.logger.log(`Subscribed as ${this.key.groupId}`);
    this.loop = this.run();
  }

  resume(): void {
    if (this._state !== ConsumerStates.paused) return;
    this.logger.log(`Resuming at offset ${this.heldOffset ?? 'next'}`);
    this._state = ConsumerStates.subscribed;
    this.wake?.();
  }

  async stop(): Promise<void> {
    this.abort.abort();
    this.wake?.();
    await this.loop;
    if (this._state !== ConsumerStates.failed) {
      this._state = ConsumerStates.stopped;
    }
  }

  /** Resolves when the loop exits on its own (failure) or after stop. */
  async done(): Promise<void> {
    await this.loop;
  }

  private async run(): Promise<void> {
    const { signal } = this.abort;
    while (!signal.aborted) {
      if (!this.held) {
        const delivery = await this.options.channel.take(
          this.options.fetchTimeoutMs,
          signal
        );
        if (!delivery) continue;
        this.held = delivery;
      }

      const result = await this.step(this.held, signal);
      if (result === 'done') {
        this.held = null;
        this._processed++;
      } else if (result === 'paused') {
        await this.waitForResume();
      } else {
        return;
      }
    }
  }

  private async step(
    delivery: Delivery,
    signal: AbortSignal
  ): Promise<StepResult> {
    const { message } = delivery;
    try {
      const record = this.options.codec.decode(message.value);
      const outcome = await retryWithBackoff(
        async () => {
          const result = await this.options.dispatcher.dispatch(record);
          await this.options.offsets.commit(this.key, message.offset);
          return result;
        },
        {
          policy: this.options.retry,
          signal,
          isRetryable: (error) => !(error instanceof FatalSchemaError),
          onRetry: (error, retry, delayMs) =>
            this.logger.warn(
              `Offset ${message.offset} failed (retry ${retry} in ${delayMs}ms): ${describeError(error)}`
            ),
        }
      );
      delivery.ack();
      this.logger.debug(
        `${outcome} ${record.event.eventType} ${record.aggregateId}@${record.version} (offset ${message.offset})`
      );
      return 'done';
    } catch (error) {
      if (isAbort(error)) {
        return 'aborted';
      }
      if (error instanceof FatalSchemaError) {
        this._lastError = error;
        this._state = ConsumerStates.failed;
        this.logger.error(
          `Fatal schema error at offset ${message.offset}: ${error.message}`
        );
        delivery.reject(error);
        return 'failed';
      }
      if (error instanceof RetryBudgetExhaustedError) {
        this._lastError = error;
        this._state = ConsumerStates.paused;
        this.logger.error(
          `Paused at offset ${message.offset} (key ${message.key}) for manual replay: ${error.message}`
        );
        return 'paused';
      }
      this._lastError =
        error instanceof Error ? error : new Error(String(error));
      this._state = ConsumerStates.failed;
      this.logger.error(
        `Unexpected failure at offset ${message.offset}: ${describeError(error)}`
      );
      return 'failed';
    }
  }

  private waitForResume(): Promise<void> {
    return new Promise<void>((resolve) => {
      if (this._state !== ConsumerStates.paused || this.abort.signal.aborted) {
        resolve();
        return;
      }
      this.wake = () => {
        this.wake = null;
        resolve();
      };
    });
  }
}
