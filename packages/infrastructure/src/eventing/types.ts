import type { EventRecord } from '@postboard/application';
import type { DomainEvent } from '@postboard/domain';

/**
 * Wire and storage shape of a single event record.
 */
export type SerializedEvent<TType extends string = string> = Readonly<{
  eventType: TType;
  aggregateId: string;
  version: number;
  occurredAt: number;
  payload: Readonly<Record<string, unknown>>;
}>;

/**
 * Translates one aggregate type's events to and from their serialized form.
 *
 * `deserialize` and `decode` throw FatalSchemaError (UnknownEventTypeError for
 * an unrecognised discriminator); nothing is ever silently dropped.
 */
export interface EventCodec<TEvent extends DomainEvent> {
  readonly aggregateType: string;
  readonly eventTypes: readonly TEvent['eventType'][];
  serialize(record: EventRecord<TEvent>): SerializedEvent<TEvent['eventType']>;
  deserialize(raw: unknown): EventRecord<TEvent>;
  encode(record: EventRecord<TEvent>): string;
  decode(text: string): EventRecord<TEvent>;
}
