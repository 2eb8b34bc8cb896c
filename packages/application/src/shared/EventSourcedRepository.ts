import type { DomainEvent } from '@postboard/domain';
import type { EventPublisherPort } from './ports/EventPublisherPort';
import type { EventStorePort } from './ports/EventStorePort';
import type { EventRecord } from './ports/types';

/**
 * The part of an aggregate root the repository relies on.
 */
export interface EventSourcedAggregate<TEvent extends DomainEvent> {
  readonly id: string;
  readonly persistedVersion: number;
  uncommittedEvents(): TEvent[];
  markCommitted(): void;
}

export type AggregateFactory<TAggregate, TEvent extends DomainEvent> = (
  id: string,
  history: readonly TEvent[]
) => TAggregate;

/**
 * Loads aggregates by replaying their stream and saves them by appending the
 * uncommitted events under the version they were loaded at.
 */
export class EventSourcedRepository<
  TAggregate extends EventSourcedAggregate<TEvent>,
  TEvent extends DomainEvent,
> {
  constructor(
    private readonly eventStore: EventStorePort<TEvent>,
    private readonly publisher: EventPublisherPort<TEvent>,
    private readonly rehydrate: AggregateFactory<TAggregate, TEvent>
  ) {}

  /**
   * @throws {NotFoundError} when no stream exists for `id`
   */
  async load(id: string): Promise<TAggregate> {
    const records = await this.eventStore.load(id);
    return this.rehydrate(
      id,
      records.map((record) => record.event)
    );
  }

  /**
   * Append, then publish. A publish failure is surfaced to the caller even
   * though the events are already durable; republishing restores the bus.
   *
   * @throws {ConcurrencyError} when the stream moved since `load`
   */
  async save(aggregate: TAggregate): Promise<EventRecord<TEvent>[]> {
    const pending = aggregate.uncommittedEvents();
    if (pending.length === 0) {
      return [];
    }
    const records = await this.eventStore.append(
      aggregate.id,
      pending,
      aggregate.persistedVersion
    );
    aggregate.markCommitted();
    await this.publisher.publish(records);
    return records;
  }
}
