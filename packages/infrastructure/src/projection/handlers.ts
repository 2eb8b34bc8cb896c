import type { EventRecord } from '@postboard/application';
import { FatalSchemaError, type DomainEvent } from '@postboard/domain';
import type { EventOfType, ProjectionHandler } from './types';

const isRecordOf = <
  TEvent extends DomainEvent,
  TType extends TEvent['eventType'],
>(
  record: EventRecord<TEvent>,
  eventType: TType
): record is EventRecord<EventOfType<TEvent, TType>> =>
  record.event.eventType === eventType;

/**
 * Bind a handler to one event kind, narrowing the record it receives.
 */
export const on = <
  TEvent extends DomainEvent,
  TView,
  TType extends TEvent['eventType'] = TEvent['eventType'],
>(
  eventType: TType,
  fn: (
    current: TView | null,
    record: EventRecord<EventOfType<TEvent, TType>>
  ) => TView | null
): ProjectionHandler<TEvent, TView> => ({
  eventType,
  apply: (current, record) => {
    const received: string = record.event.eventType;
    if (isRecordOf(record, eventType)) {
      return fn(current, record);
    }
    throw new FatalSchemaError(
      `Handler for ${eventType} received ${received}`
    );
  },
});
