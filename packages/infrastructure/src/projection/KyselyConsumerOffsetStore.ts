import type { Kysely } from 'kysely';
import type { Database } from '../database/database.types';
import type { ConsumerOffsetStore, PartitionKey } from './ConsumerOffsetStore';

export class KyselyConsumerOffsetStore implements ConsumerOffsetStore {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly clock: () => number = Date.now
  ) {}

  async get({
    groupId,
    topic,
    partition,
  }: PartitionKey): Promise<number | null> {
    const row = await this.db
      .selectFrom('consumer_offsets')
      .select('committed_offset')
      .where('group_id', '=', groupId)
      .where('topic', '=', topic)
      .where('partition', '=', partition)
      .executeTakeFirst();
    return row ? Number(row.committed_offset) : null;
  }

  async commit(
    { groupId, topic, partition }: PartitionKey,
    offset: number
  ): Promise<void> {
    const updatedAt = this.clock();
    await this.db
      .insertInto('consumer_offsets')
      .values({
        group_id: groupId,
        topic,
        partition,
        committed_offset: offset,
        updated_at: updatedAt,
      })
      .onConflict((oc) =>
        oc
          .columns(['group_id', 'topic', 'partition'])
          .doUpdateSet({ committed_offset: offset, updated_at: updatedAt })
          .where('consumer_offsets.committed_offset', '<', offset)
      )
      .execute();
  }
}
