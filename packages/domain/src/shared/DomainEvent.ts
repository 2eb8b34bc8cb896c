/**
 * Base shape of every domain event.
 *
 * Events are immutable facts. `eventType` is the discriminator that survives
 * serialization, so the consuming side can resolve the concrete kind again.
 */
export type DomainEvent<TType extends string = string> = Readonly<{
  eventType: TType;
  aggregateId: string;
  /** Epoch milliseconds. */
  occurredAt: number;
}>;
