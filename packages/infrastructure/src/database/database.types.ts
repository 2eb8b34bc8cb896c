import type { ColumnType } from 'kysely';

/**
 * Epoch millis. pg hands bigint back as a string, SQLite as a number.
 */
type EpochColumn = ColumnType<string | number, number, number>;

export interface EventsTable {
  aggregate_id: string;
  aggregate_type: string;
  version: number;
  event_type: string;
  payload: string;
  occurred_at: EpochColumn;
  recorded_at: EpochColumn;
}

export interface PostsTable {
  post_id: string;
  author: string;
  /** Lower-cased author, for case-insensitive lookups. */
  author_key: string;
  message: string;
  date_posted: EpochColumn;
  likes: number;
  comment_count: number;
  /** JSON array of CommentDto. */
  comments: string;
  active: number;
  version: number;
  updated_at: EpochColumn;
}

export interface ConsumerOffsetsTable {
  group_id: string;
  topic: string;
  partition: number;
  committed_offset: EpochColumn;
  updated_at: EpochColumn;
}

export interface Database {
  events: EventsTable;
  posts: PostsTable;
  consumer_offsets: ConsumerOffsetsTable;
}
