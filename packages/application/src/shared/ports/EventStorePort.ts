import type { DomainEvent } from '@postboard/domain';
import type { EventRecord } from './types';

/**
 * Append-only, per-aggregate event log guarded by optimistic concurrency.
 */
export interface EventStorePort<TEvent extends DomainEvent = DomainEvent> {
  /**
   * Append `events` if, and only if, the stream currently holds exactly
   * `expectedVersion` events. All or nothing.
   *
   * @throws {ConcurrencyError} when the stream length differs
   */
  append(
    aggregateId: string,
    events: readonly TEvent[],
    expectedVersion: number
  ): Promise<EventRecord<TEvent>[]>;

  /**
   * @throws {NotFoundError} when the aggregate was never created
   */
  load(aggregateId: string): Promise<EventRecord<TEvent>[]>;

  listAggregateIds(): Promise<string[]>;
}
