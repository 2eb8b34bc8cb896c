import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConcurrencyError, NotFoundError } from '@postboard/application';
import { FatalSchemaError, type PostEvent } from '@postboard/domain';
import type { Kysely } from 'kysely';
import type { Database } from '../../src/database/database.types';
import { KyselyEventStore } from '../../src/eventstore/KyselyEventStore';
import { PostEventCodec } from '../../src/posts/PostEventCodec';
import { createTestDatabase } from '../fixtures/TestDatabase';
import { commentAdded, created, liked, removed } from '../fixtures/postEvents';

describe('KyselyEventStore', () => {
  let db: Kysely<Database>;
  let store: KyselyEventStore<PostEvent>;

  beforeEach(async () => {
    db = await createTestDatabase();
    store = new KyselyEventStore(db, PostEventCodec, () => 42);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('appends and loads a stream in order', async () => {
    const appended = await store.append(
      'post-1',
      [created('post-1'), liked('post-1')],
      0
    );
    await store.append('post-1', [commentAdded('post-1', 'c-1')], 2);

    const loaded = await store.load('post-1');

    expect(appended.map((record) => record.version)).toEqual([1, 2]);
    expect(loaded).toEqual([
      { aggregateId: 'post-1', version: 1, event: created('post-1') },
      { aggregateId: 'post-1', version: 2, event: liked('post-1') },
      {
        aggregateId: 'post-1',
        version: 3,
        event: commentAdded('post-1', 'c-1'),
      },
    ]);
  });

  it('stores the row metadata', async () => {
    await store.append('post-1', [created('post-1')], 0);

    const row = await db
      .selectFrom('events')
      .selectAll()
      .executeTakeFirstOrThrow();

    expect(row.aggregate_type).toBe('post');
    expect(row.event_type).toBe('PostCreated');
    expect(JSON.parse(row.payload)).toEqual({ author: 'alice', message: 'hi' });
    expect(Number(row.occurred_at)).toBe(1_000);
    expect(Number(row.recorded_at)).toBe(42);
  });

  it('treats an empty append as a no-op', async () => {
    expect(await store.append('post-1', [], 0)).toEqual([]);
    await expect(store.load('post-1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects a stale expected version and writes nothing', async () => {
    await store.append('post-1', [created('post-1'), liked('post-1')], 0);

    const result = store.append(
      'post-1',
      [liked('post-1'), removed('post-1')],
      1
    );

    await expect(result).rejects.toBeInstanceOf(ConcurrencyError);
    await expect(result).rejects.toMatchObject({
      details: { aggregateId: 'post-1', expectedVersion: 1, actualVersion: 2 },
    });
    expect(await store.load('post-1')).toHaveLength(2);
  });

  it('lets exactly one of two racing appends win', async () => {
    await store.append(
      'post-1',
      [created('post-1'), liked('post-1'), liked('post-1')],
      0
    );

    const results = await Promise.allSettled([
      store.append('post-1', [liked('post-1', 4_000)], 3),
      store.append('post-1', [removed('post-1')], 3),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(ConcurrencyError);
    expect(await store.load('post-1')).toHaveLength(4);
  });

  it('fails with NotFoundError for an unknown stream', async () => {
    await expect(store.load('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists stream ids sorted', async () => {
    await store.append('post-b', [created('post-b')], 0);
    await store.append('post-a', [created('post-a')], 0);
    await store.append('post-a', [liked('post-a')], 1);

    expect(await store.listAggregateIds()).toEqual(['post-a', 'post-b']);
  });

  it('refuses to load a stream with an unknown event kind', async () => {
    await db
      .insertInto('events')
      .values({
        aggregate_id: 'post-1',
        aggregate_type: 'post',
        version: 1,
        event_type: 'PostPinned',
        payload: '{}',
        occurred_at: 1,
        recorded_at: 1,
      })
      .execute();

    await expect(store.load('post-1')).rejects.toBeInstanceOf(
      FatalSchemaError
    );
  });
});
