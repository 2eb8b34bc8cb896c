import type { DomainEvent } from '@postboard/domain';
import type { EventRecord } from './types';

/**
 * Pushes committed records onto the bus, in order, keyed by aggregate id.
 */
export interface EventPublisherPort<TEvent extends DomainEvent = DomainEvent> {
  publish(records: readonly EventRecord<TEvent>[]): Promise<void>;
}
