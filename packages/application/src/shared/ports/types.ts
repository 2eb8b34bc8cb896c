import type { DomainEvent } from '@postboard/domain';

/**
 * An event together with its 1-based position in its aggregate's stream.
 */
export type EventRecord<TEvent extends DomainEvent = DomainEvent> = Readonly<{
  aggregateId: string;
  version: number;
  event: TEvent;
}>;
