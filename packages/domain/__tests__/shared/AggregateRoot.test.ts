import { describe, expect, it } from 'vitest';
import { AggregateRoot } from '../../src/shared/AggregateRoot';
import type { DomainEvent } from '../../src/shared/DomainEvent';
import { InvariantViolationError } from '../../src/shared/errors';

type Incremented = DomainEvent<'Incremented'> & Readonly<{ by: number }>;

class Counter extends AggregateRoot<number, Incremented> {
  constructor(id: string) {
    super(id, 0, (total, event) => total + event.by);
  }

  increment(by: number, at = 1): void {
    this.raiseEvent({
      eventType: 'Incremented',
      aggregateId: this.id,
      occurredAt: at,
      by,
    });
  }

  get total(): number {
    return this.state;
  }
}

const incremented = (aggregateId: string, by: number): Incremented => ({
  eventType: 'Incremented',
  aggregateId,
  occurredAt: 1,
  by,
});

describe('AggregateRoot', () => {
  it('buffers raised events and counts them in the version', () => {
    const counter = new Counter('c-1');
    counter.increment(2);
    counter.increment(3);

    expect(counter.total).toBe(5);
    expect(counter.version).toBe(2);
    expect(counter.persistedVersion).toBe(0);
    expect(counter.uncommittedEvents().map((e) => e.by)).toEqual([2, 3]);
  });

  it('returns a copy of the buffer without clearing it', () => {
    const counter = new Counter('c-1');
    counter.increment(1);

    const events = counter.uncommittedEvents();
    events.pop();

    expect(counter.uncommittedEvents()).toHaveLength(1);
  });

  it('clears the buffer on markCommitted and keeps the version', () => {
    const counter = new Counter('c-1');
    counter.increment(1);
    counter.markCommitted();

    expect(counter.uncommittedEvents()).toEqual([]);
    expect(counter.version).toBe(1);
    expect(counter.persistedVersion).toBe(1);
  });

  it('replays history without buffering it', () => {
    const counter = new Counter('c-1');
    counter.replay([incremented('c-1', 4), incremented('c-1', 6)]);

    expect(counter.total).toBe(10);
    expect(counter.version).toBe(2);
    expect(counter.uncommittedEvents()).toEqual([]);
  });

  it('refuses to replay on top of existing state', () => {
    const counter = new Counter('c-1');
    counter.replay([incremented('c-1', 1)]);

    expect(() => counter.replay([incremented('c-1', 1)])).toThrow(
      InvariantViolationError
    );
    expect(counter.version).toBe(1);
  });

  it('refuses to replay once events were raised', () => {
    const counter = new Counter('c-1');
    counter.increment(1);

    expect(() => counter.replay([incremented('c-1', 1)])).toThrow(
      InvariantViolationError
    );
  });

  it('rejects events that belong to another aggregate', () => {
    const counter = new Counter('c-1');

    expect(() => counter.replay([incremented('c-2', 1)])).toThrow(
      InvariantViolationError
    );
    expect(counter.version).toBe(0);
    expect(counter.total).toBe(0);
  });
});
