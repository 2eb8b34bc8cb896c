import { Logger } from '@nestjs/common';
import {
  ConcurrencyError,
  NotFoundError,
  type EventRecord,
  type EventStorePort,
} from '@postboard/application';
import { FatalSchemaError, type DomainEvent } from '@postboard/domain';
import type { Kysely, Selectable } from 'kysely';
import type { Database, EventsTable } from '../database/database.types';
import { isUniqueViolation } from '../database/errors';
import type { EventCodec } from '../eventing/types';

type EventRow = Pick<
  Selectable<EventsTable>,
  'aggregate_id' | 'version' | 'event_type' | 'payload' | 'occurred_at'
>;

const parsePayload = (row: EventRow): unknown => {
  try {
    const parsed: unknown = JSON.parse(row.payload);
    return parsed;
  } catch {
    throw new FatalSchemaError(
      `Stored payload of ${row.aggregate_id}@${row.version} is not JSON`
    );
  }
};

/**
 * Event store over any Kysely dialect: Postgres in production, SQLite in
 * tests.
 *
 * The head check and the insert share one transaction; the
 * (aggregate_id, version) primary key catches the race the check cannot see.
 */
export class KyselyEventStore<TEvent extends DomainEvent>
  implements EventStorePort<TEvent>
{
  private readonly logger = new Logger(KyselyEventStore.name);

  constructor(
    private readonly db: Kysely<Database>,
    private readonly codec: EventCodec<TEvent>,
    private readonly clock: () => number = Date.now
  ) {}

  async append(
    aggregateId: string,
    events: readonly TEvent[],
    expectedVersion: number
  ): Promise<EventRecord<TEvent>[]> {
    if (events.length === 0) return [];
    const records = events.map<EventRecord<TEvent>>((event, index) => ({
      aggregateId,
      version: expectedVersion + index + 1,
      event,
    }));

    try {
      await this.db.transaction().execute(async (trx) => {
        const headRow = await trx
          .selectFrom('events')
          .select(({ fn, val }) =>
            fn.coalesce(fn.max<number>('version'), val(0)).as('head')
          )
          .where('aggregate_id', '=', aggregateId)
          .executeTakeFirst();
        const currentHead = Number(headRow?.head ?? 0);
        if (currentHead !== expectedVersion) {
          throw new ConcurrencyError(
            `Expected ${aggregateId} at version ${expectedVersion} but found ${currentHead}`,
            { aggregateId, expectedVersion, actualVersion: currentHead }
          );
        }

        const recordedAt = this.clock();
        await trx
          .insertInto('events')
          .values(
            records.map((record) => {
              const serialized = this.codec.serialize(record);
              return {
                aggregate_id: aggregateId,
                aggregate_type: this.codec.aggregateType,
                version: record.version,
                event_type: serialized.eventType,
                payload: JSON.stringify(serialized.payload),
                occurred_at: serialized.occurredAt,
                recorded_at: recordedAt,
              };
            })
          )
          .execute();
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.debug(
          `Concurrent append to ${aggregateId} at version ${expectedVersion}`
        );
        throw new ConcurrencyError(
          `Concurrent append to ${aggregateId} at version ${expectedVersion}`,
          { aggregateId, expectedVersion }
        );
      }
      throw error;
    }

    return records;
  }

  async load(aggregateId: string): Promise<EventRecord<TEvent>[]> {
    const rows = await this.db
      .selectFrom('events')
      .select([
        'aggregate_id',
        'version',
        'event_type',
        'payload',
        'occurred_at',
      ])
      .where('aggregate_id', '=', aggregateId)
      .where('aggregate_type', '=', this.codec.aggregateType)
      .orderBy('version', 'asc')
      .execute();

    if (rows.length === 0) {
      throw new NotFoundError(
        aggregateId,
        `No ${this.codec.aggregateType} stream for ${aggregateId}`
      );
    }

    return rows.map((row) =>
      this.codec.deserialize({
        eventType: row.event_type,
        aggregateId: row.aggregate_id,
        version: Number(row.version),
        occurredAt: Number(row.occurred_at),
        payload: parsePayload(row),
      })
    );
  }

  async listAggregateIds(): Promise<string[]> {
    const rows = await this.db
      .selectFrom('events')
      .select('aggregate_id')
      .distinct()
      .where('aggregate_type', '=', this.codec.aggregateType)
      .orderBy('aggregate_id', 'asc')
      .execute();
    return rows.map((row) => row.aggregate_id);
  }
}
