import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PostDto } from '@postboard/application';
import type { Kysely } from 'kysely';
import type { Database } from '../../src/database/database.types';
import { KyselyPostReadModel } from '../../src/posts/KyselyPostReadModel';
import { createTestDatabase } from '../fixtures/TestDatabase';

const view = (overrides: Partial<PostDto> & Pick<PostDto, 'postId'>): PostDto => ({
  author: 'alice',
  message: 'hi',
  datePosted: 1_000,
  likes: 0,
  comments: [],
  active: true,
  version: 1,
  updatedAt: 1_000,
  ...overrides,
});

const comment = {
  commentId: 'c-1',
  username: 'bob',
  comment: 'nice',
  commentDate: 2_000,
  edited: false,
  editedAt: null,
};

describe('KyselyPostReadModel', () => {
  let db: Kysely<Database>;
  let readModel: KyselyPostReadModel;

  beforeEach(async () => {
    db = await createTestDatabase();
    readModel = new KyselyPostReadModel(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('round-trips a view with comments', async () => {
    const post = view({ postId: 'post-1', comments: [comment], version: 2 });

    await readModel.save('post-1', post);

    expect(await readModel.get('post-1')).toEqual(post);
  });

  it('never overwrites a newer version', async () => {
    await readModel.save('post-1', view({ postId: 'post-1', likes: 3, version: 4 }));
    await readModel.save('post-1', view({ postId: 'post-1', likes: 1, version: 2 }));
    await readModel.save('post-1', view({ postId: 'post-1', likes: 9, version: 4 }));

    const stored = await readModel.get('post-1');
    expect(stored?.likes).toBe(3);
    expect(stored?.version).toBe(4);

    await readModel.save('post-1', view({ postId: 'post-1', likes: 4, version: 5 }));
    expect((await readModel.get('post-1'))?.likes).toBe(4);
  });

  it('hides removed posts from queries', async () => {
    await readModel.save('post-1', view({ postId: 'post-1', active: false }));

    expect(await readModel.get('post-1')).not.toBeNull();
    expect(await readModel.getById('post-1')).toBeNull();
    expect(await readModel.list()).toEqual([]);
  });

  it('filters and orders listings', async () => {
    await readModel.save(
      'post-1',
      view({ postId: 'post-1', author: 'Alice', datePosted: 1_000, likes: 5 })
    );
    await readModel.save(
      'post-2',
      view({
        postId: 'post-2',
        author: 'bob',
        datePosted: 3_000,
        comments: [comment],
      })
    );
    await readModel.save(
      'post-3',
      view({ postId: 'post-3', author: 'alice', datePosted: 2_000, likes: 1 })
    );

    const ids = (posts: PostDto[]) => posts.map((post) => post.postId);

    expect(ids(await readModel.list())).toEqual(['post-2', 'post-3', 'post-1']);
    expect(ids(await readModel.list({ author: 'ALICE' }))).toEqual([
      'post-3',
      'post-1',
    ]);
    expect(ids(await readModel.list({ withComments: true }))).toEqual([
      'post-2',
    ]);
    expect(ids(await readModel.list({ minLikes: 1 }))).toEqual([
      'post-3',
      'post-1',
    ]);
    expect(ids(await readModel.list({ author: 'alice', minLikes: 2 }))).toEqual(
      ['post-1']
    );
  });
});
