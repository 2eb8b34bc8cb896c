import type {
  CommentDto,
  PostDto,
  PostListFilter,
  PostReadModelPort,
} from '@postboard/application';
import { FatalSchemaError } from '@postboard/domain';
import type { Kysely, Selectable } from 'kysely';
import { z } from 'zod';
import type { Database, PostsTable } from '../database/database.types';
import type { ProjectionStore } from '../projection/types';

const commentsSchema = z.array(
  z.object({
    commentId: z.string(),
    username: z.string(),
    comment: z.string(),
    commentDate: z.number(),
    edited: z.boolean(),
    editedAt: z.number().nullable(),
  })
);

const parseComments = (postId: string, raw: string): CommentDto[] => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new FatalSchemaError(`Comments of post ${postId} are not JSON`);
  }
  const parsed = commentsSchema.safeParse(json);
  if (!parsed.success) {
    throw new FatalSchemaError(
      `Comments of post ${postId} are malformed: ${parsed.error.message}`
    );
  }
  return parsed.data;
};

const toDto = (row: Selectable<PostsTable>): PostDto => ({
  postId: row.post_id,
  author: row.author,
  message: row.message,
  datePosted: Number(row.date_posted),
  likes: Number(row.likes),
  comments: parseComments(row.post_id, row.comments),
  active: Number(row.active) === 1,
  version: Number(row.version),
  updatedAt: Number(row.updated_at),
});

/**
 * Post projection table. Writes are version-guarded upserts, so a redelivered
 * or replayed record can never roll a view backwards.
 */
export class KyselyPostReadModel
  implements PostReadModelPort, ProjectionStore<PostDto>
{
  constructor(private readonly db: Kysely<Database>) {}

  async get(postId: string): Promise<PostDto | null> {
    const row = await this.db
      .selectFrom('posts')
      .selectAll()
      .where('post_id', '=', postId)
      .executeTakeFirst();
    return row ? toDto(row) : null;
  }

  async save(postId: string, view: PostDto): Promise<void> {
    const values = {
      post_id: postId,
      author: view.author,
      author_key: view.author.toLowerCase(),
      message: view.message,
      date_posted: view.datePosted,
      likes: view.likes,
      comment_count: view.comments.length,
      comments: JSON.stringify(view.comments),
      active: view.active ? 1 : 0,
      version: view.version,
      updated_at: view.updatedAt,
    };
    await this.db
      .insertInto('posts')
      .values(values)
      .onConflict((oc) =>
        oc
          .column('post_id')
          .doUpdateSet({
            author: values.author,
            author_key: values.author_key,
            message: values.message,
            date_posted: values.date_posted,
            likes: values.likes,
            comment_count: values.comment_count,
            comments: values.comments,
            active: values.active,
            version: values.version,
            updated_at: values.updated_at,
          })
          .where('posts.version', '<', view.version)
      )
      .execute();
  }

  async getById(postId: string): Promise<PostDto | null> {
    const row = await this.db
      .selectFrom('posts')
      .selectAll()
      .where('post_id', '=', postId)
      .where('active', '=', 1)
      .executeTakeFirst();
    return row ? toDto(row) : null;
  }

  async list(filter: PostListFilter = {}): Promise<PostDto[]> {
    let query = this.db
      .selectFrom('posts')
      .selectAll()
      .where('active', '=', 1);
    if (filter.author !== undefined) {
      query = query.where('author_key', '=', filter.author.toLowerCase());
    }
    if (filter.withComments) {
      query = query.where('comment_count', '>', 0);
    }
    if (filter.minLikes !== undefined) {
      query = query.where('likes', '>=', filter.minLikes);
    }
    const rows = await query
      .orderBy('date_posted', 'desc')
      .orderBy('post_id', 'asc')
      .execute();
    return rows.map(toDto);
  }
}
