import type { DomainEvent } from '@postboard/domain';
import type { EventPublisherPort } from './ports/EventPublisherPort';
import type { EventStorePort } from './ports/EventStorePort';

export type RepublishSummary = Readonly<{
  aggregates: number;
  events: number;
}>;

/**
 * Pushes every stored stream onto the bus again, oldest event first.
 *
 * Used to rebuild a read model or to recover from a publish that failed after
 * its append succeeded. Projection handlers skip versions they already hold.
 */
export class EventRepublisher<TEvent extends DomainEvent = DomainEvent> {
  constructor(
    private readonly eventStore: EventStorePort<TEvent>,
    private readonly publisher: EventPublisherPort<TEvent>
  ) {}

  async republishAll(): Promise<RepublishSummary> {
    const ids = await this.eventStore.listAggregateIds();
    let events = 0;
    for (const id of ids) {
      events += await this.republish(id);
    }
    return { aggregates: ids.length, events };
  }

  async republish(aggregateId: string): Promise<number> {
    const records = await this.eventStore.load(aggregateId);
    await this.publisher.publish(records);
    return records.length;
  }
}
