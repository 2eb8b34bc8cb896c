import {
  TransientInfrastructureError,
  type EventPublisherPort,
  type EventRecord,
} from '@postboard/application';
import type { DomainEvent } from '@postboard/domain';
import type { EventCodec } from '../eventing/types';
import type { BusProducer } from './types';

export const EVENT_TYPE_HEADER = 'event-type';

/**
 * Publishes committed records to the aggregate type's topic, keyed by
 * aggregate id so a stream always lands on one partition.
 */
export class EventBusPublisher<TEvent extends DomainEvent>
  implements EventPublisherPort<TEvent>
{
  constructor(
    private readonly producer: BusProducer,
    private readonly topic: string,
    private readonly codec: EventCodec<TEvent>
  ) {}

  async publish(records: readonly EventRecord<TEvent>[]): Promise<void> {
    if (records.length === 0) return;
    const messages = records.map((record) => ({
      key: record.aggregateId,
      value: this.codec.encode(record),
      headers: { [EVENT_TYPE_HEADER]: record.event.eventType },
    }));
    try {
      await this.producer.send(this.topic, messages);
    } catch (error) {
      if (error instanceof TransientInfrastructureError) throw error;
      throw new TransientInfrastructureError(
        `Publishing to ${this.topic} failed`,
        error
      );
    }
  }
}
