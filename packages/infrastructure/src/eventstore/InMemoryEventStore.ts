import {
  ConcurrencyError,
  NotFoundError,
  type EventRecord,
  type EventStorePort,
} from '@postboard/application';
import type { DomainEvent } from '@postboard/domain';

/**
 * Process-local event store for the `memory` storage driver and tests.
 * Append is synchronous past the version check, so it is atomic on one loop.
 */
export class InMemoryEventStore<TEvent extends DomainEvent>
  implements EventStorePort<TEvent>
{
  private readonly streams = new Map<string, EventRecord<TEvent>[]>();

  async append(
    aggregateId: string,
    events: readonly TEvent[],
    expectedVersion: number
  ): Promise<EventRecord<TEvent>[]> {
    if (events.length === 0) return [];
    const stream = this.streams.get(aggregateId) ?? [];
    if (stream.length !== expectedVersion) {
      throw new ConcurrencyError(
        `Expected ${aggregateId} at version ${expectedVersion} but found ${stream.length}`,
        { aggregateId, expectedVersion, actualVersion: stream.length }
      );
    }
    const records = events.map<EventRecord<TEvent>>((event, index) => ({
      aggregateId,
      version: expectedVersion + index + 1,
      event,
    }));
    this.streams.set(aggregateId, [...stream, ...records]);
    return records;
  }

  async load(aggregateId: string): Promise<EventRecord<TEvent>[]> {
    const stream = this.streams.get(aggregateId);
    if (!stream) {
      throw new NotFoundError(aggregateId);
    }
    return [...stream];
  }

  async listAggregateIds(): Promise<string[]> {
    return [...this.streams.keys()].sort();
  }
}
