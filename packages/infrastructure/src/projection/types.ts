import type { EventRecord } from '@postboard/application';
import type { DomainEvent } from '@postboard/domain';

export type VersionedView = Readonly<{ version: number }>;

export type EventOfType<
  TEvent extends DomainEvent,
  TType extends TEvent['eventType'],
> = Extract<TEvent, { eventType: TType }>;

/**
 * One row of a projection's dispatch table.
 *
 * `apply` returns the next view, or null when the record cannot be applied
 * to `current` (e.g. an update for a view that was never created).
 */
export type ProjectionHandler<TEvent extends DomainEvent, TView> = Readonly<{
  eventType: TEvent['eventType'];
  apply(current: TView | null, record: EventRecord<TEvent>): TView | null;
}>;

export type ProjectionTable<TEvent extends DomainEvent, TView> = Readonly<{
  [TType in TEvent['eventType']]: ProjectionHandler<TEvent, TView>;
}>;

/**
 * Write side of a read model: fetch the current view, store the next one.
 * `save` must not overwrite a view holding a newer version.
 */
export interface ProjectionStore<TView extends VersionedView> {
  get(aggregateId: string): Promise<TView | null>;
  save(aggregateId: string, view: TView): Promise<void>;
}

export type DispatchOutcome = 'applied' | 'skipped';
