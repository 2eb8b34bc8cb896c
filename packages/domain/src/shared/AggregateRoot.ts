import { Entity } from './Entity';
import type { DomainEvent } from './DomainEvent';
import { InvariantViolationError } from './errors';

/**
 * Pure state transition: must not mutate `state` and must not perform I/O.
 */
export type Reducer<TState, TEvent extends DomainEvent> = (
  state: TState,
  event: TEvent
) => TState;

/**
 * Base class for event-sourced aggregate roots.
 *
 * State is never mutated directly: every change is an event folded through the
 * aggregate's reducer. `version` always equals the number of events applied,
 * whether they came from `replay` or from `raiseEvent`.
 */
export abstract class AggregateRoot<
  TState,
  TEvent extends DomainEvent,
> extends Entity {
  private _uncommittedEvents: TEvent[] = [];
  private _version = 0;
  private _state: TState;

  protected constructor(
    id: string,
    initialState: TState,
    private readonly reducer: Reducer<TState, TEvent>
  ) {
    super(id);
    this._state = initialState;
  }

  /**
   * Apply a freshly raised event.
   *
   * Business preconditions are checked by the calling command method before
   * the event is built; here we only guard the aggregate boundary.
   */
  protected raiseEvent(event: TEvent): void {
    this.assertOwnEvent(event);
    this._state = this.reducer(this._state, event);
    this._uncommittedEvents.push(event);
    this._version++;
  }

  /**
   * Fold persisted history into state. Only valid on a fresh instance.
   */
  replay(events: readonly TEvent[]): void {
    if (this._version !== 0 || this._uncommittedEvents.length > 0) {
      throw new InvariantViolationError(
        `Cannot replay onto ${this.constructor.name} ${this.id} at version ${this._version}`
      );
    }
    let state = this._state;
    for (const event of events) {
      this.assertOwnEvent(event);
      state = this.reducer(state, event);
    }
    this._state = state;
    this._version = events.length;
  }

  /**
   * Events raised since the last commit. The buffer is left untouched.
   */
  uncommittedEvents(): TEvent[] {
    return [...this._uncommittedEvents];
  }

  /**
   * Called once the uncommitted events are durably appended.
   */
  markCommitted(): void {
    this._uncommittedEvents = [];
  }

  get version(): number {
    return this._version;
  }

  /** Version of the stream as last loaded or committed. */
  get persistedVersion(): number {
    return this._version - this._uncommittedEvents.length;
  }

  protected get state(): TState {
    return this._state;
  }

  private assertOwnEvent(event: TEvent): void {
    if (event.aggregateId !== this.id) {
      throw new InvariantViolationError(
        `Event ${event.eventType} belongs to ${event.aggregateId}, not ${this.id}`
      );
    }
  }
}
