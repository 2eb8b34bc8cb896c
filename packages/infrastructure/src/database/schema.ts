import type { Kysely } from 'kysely';
import type { Database } from './database.types';

/**
 * Create the event, read-model and offset tables when they are missing.
 *
 * Sticks to column types both Postgres and SQLite understand.
 */
export async function ensureSchema(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable('events')
    .ifNotExists()
    .addColumn('aggregate_id', 'varchar(200)', (col) => col.notNull())
    .addColumn('aggregate_type', 'varchar(64)', (col) => col.notNull())
    .addColumn('version', 'integer', (col) => col.notNull())
    .addColumn('event_type', 'varchar(64)', (col) => col.notNull())
    .addColumn('payload', 'text', (col) => col.notNull())
    .addColumn('occurred_at', 'bigint', (col) => col.notNull())
    .addColumn('recorded_at', 'bigint', (col) => col.notNull())
    .addPrimaryKeyConstraint('events_pkey', ['aggregate_id', 'version'])
    .execute();

  await db.schema
    .createIndex('events_aggregate_type_idx')
    .ifNotExists()
    .on('events')
    .columns(['aggregate_type', 'aggregate_id'])
    .execute();

  await db.schema
    .createTable('posts')
    .ifNotExists()
    .addColumn('post_id', 'varchar(200)', (col) => col.primaryKey())
    .addColumn('author', 'text', (col) => col.notNull())
    .addColumn('author_key', 'text', (col) => col.notNull())
    .addColumn('message', 'text', (col) => col.notNull())
    .addColumn('date_posted', 'bigint', (col) => col.notNull())
    .addColumn('likes', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('comment_count', 'integer', (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn('comments', 'text', (col) => col.notNull())
    .addColumn('active', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('version', 'integer', (col) => col.notNull())
    .addColumn('updated_at', 'bigint', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('posts_author_key_idx')
    .ifNotExists()
    .on('posts')
    .column('author_key')
    .execute();

  await db.schema
    .createTable('consumer_offsets')
    .ifNotExists()
    .addColumn('group_id', 'varchar(200)', (col) => col.notNull())
    .addColumn('topic', 'varchar(200)', (col) => col.notNull())
    .addColumn('partition', 'integer', (col) => col.notNull())
    .addColumn('committed_offset', 'bigint', (col) => col.notNull())
    .addColumn('updated_at', 'bigint', (col) => col.notNull())
    .addPrimaryKeyConstraint('consumer_offsets_pkey', [
      'group_id',
      'topic',
      'partition',
    ])
    .execute();
}
