import { describe, expect, it } from 'vitest';
import type { EventRecord, PostDto } from '@postboard/application';
import {
  FatalSchemaError,
  UnknownEventTypeError,
  allPostEventTypes,
  postEventTypes,
  type PostEvent,
} from '@postboard/domain';
import { InMemoryPostReadModel } from '../../src/posts/InMemoryPostReadModel';
import {
  createPostProjectionDispatcher,
  postProjectionTable,
} from '../../src/posts/PostProjection';
import { ProjectionDispatcher } from '../../src/projection/ProjectionDispatcher';
import { commentAdded, created, liked, removed } from '../fixtures/postEvents';

const at = (version: number, event: PostEvent): EventRecord<PostEvent> => ({
  aggregateId: event.aggregateId,
  version,
  event,
});

const setup = () => {
  const readModel = new InMemoryPostReadModel();
  return { readModel, dispatcher: createPostProjectionDispatcher(readModel) };
};

describe('post projection', () => {
  it('creates the view from PostCreated', async () => {
    const { readModel, dispatcher } = setup();

    expect(await dispatcher.dispatch(at(1, created('post-1')))).toBe('applied');

    expect(await readModel.get('post-1')).toEqual({
      postId: 'post-1',
      author: 'alice',
      message: 'hi',
      datePosted: 1_000,
      likes: 0,
      comments: [],
      active: true,
      version: 1,
      updatedAt: 1_000,
    });
  });

  it('ignores records the view already reflects', async () => {
    const { readModel, dispatcher } = setup();
    await dispatcher.dispatch(at(1, created('post-1')));
    await dispatcher.dispatch(at(2, liked('post-1')));

    expect(await dispatcher.dispatch(at(2, liked('post-1')))).toBe('skipped');
    expect(await dispatcher.dispatch(at(1, created('post-1')))).toBe(
      'skipped'
    );

    const view = await readModel.get('post-1');
    expect(view?.likes).toBe(1);
    expect(view?.version).toBe(2);
  });

  it('holds back a record that is ahead of the view', async () => {
    const { readModel, dispatcher } = setup();
    await dispatcher.dispatch(at(1, created('post-1')));

    expect(await dispatcher.dispatch(at(3, liked('post-1')))).toBe('skipped');
    expect((await readModel.get('post-1'))?.version).toBe(1);

    expect(
      await dispatcher.dispatch(at(2, commentAdded('post-1', 'c-1')))
    ).toBe('applied');
    expect(await dispatcher.dispatch(at(3, liked('post-1')))).toBe('applied');
    const view = await readModel.get('post-1');
    expect(view?.version).toBe(3);
    expect(view?.likes).toBe(1);
    expect(view?.comments.map((c) => c.commentId)).toEqual(['c-1']);
  });

  it('skips updates for a post it has never seen', async () => {
    const { readModel, dispatcher } = setup();

    expect(await dispatcher.dispatch(at(2, liked('post-9')))).toBe('skipped');
    expect(await readModel.get('post-9')).toBeNull();
  });

  it('keeps the comment date and takes the editor name on edits', async () => {
    const { readModel, dispatcher } = setup();
    await dispatcher.dispatch(at(1, created('post-1')));
    await dispatcher.dispatch(at(2, commentAdded('post-1', 'c-1')));
    await dispatcher.dispatch(
      at(3, {
        eventType: postEventTypes.commentUpdated,
        aggregateId: 'post-1',
        occurredAt: 4_000,
        commentId: 'c-1',
        comment: 'nicer',
        username: 'BOB',
      })
    );

    const view = await readModel.get('post-1');
    expect(view?.comments).toEqual([
      {
        commentId: 'c-1',
        username: 'BOB',
        comment: 'nicer',
        commentDate: 3_000,
        edited: true,
        editedAt: 4_000,
      },
    ]);
    expect(view?.updatedAt).toBe(4_000);
  });

  it('drops removed comments', async () => {
    const { readModel, dispatcher } = setup();
    await dispatcher.dispatch(at(1, created('post-1')));
    await dispatcher.dispatch(at(2, commentAdded('post-1', 'c-1')));
    await dispatcher.dispatch(
      at(3, {
        eventType: postEventTypes.commentRemoved,
        aggregateId: 'post-1',
        occurredAt: 5_000,
        commentId: 'c-1',
      })
    );

    expect((await readModel.get('post-1'))?.comments).toEqual([]);
  });

  it('soft-deletes the view on PostRemoved', async () => {
    const { readModel, dispatcher } = setup();
    await dispatcher.dispatch(at(1, created('post-1')));
    await dispatcher.dispatch(at(2, removed('post-1')));

    expect((await readModel.get('post-1'))?.active).toBe(false);
    expect(await readModel.getById('post-1')).toBeNull();
    expect(await readModel.list()).toEqual([]);
  });

  it('throws for a record kind the table does not know', async () => {
    const { dispatcher } = setup();
    const bogus: EventRecord<PostEvent> = JSON.parse(
      '{"aggregateId":"post-1","version":1,"event":{"eventType":"PostPinned","aggregateId":"post-1","occurredAt":1}}'
    );

    await expect(dispatcher.dispatch(bogus)).rejects.toBeInstanceOf(
      UnknownEventTypeError
    );
  });
});

describe('ProjectionDispatcher table validation', () => {
  it('refuses a table missing a known kind', () => {
    expect(
      () =>
        new ProjectionDispatcher<PostEvent, PostDto>(
          'posts',
          postProjectionTable,
          [...allPostEventTypes, 'PostPinned'],
          new InMemoryPostReadModel()
        )
    ).toThrow(
      new FatalSchemaError(
        'Projection posts handler table mismatch: missing [PostPinned], unexpected [], mislabelled []'
      )
    );
  });

  it('refuses a handler filed under the wrong kind', () => {
    const table = {
      ...postProjectionTable,
      [postEventTypes.postLiked]:
        postProjectionTable[postEventTypes.messageUpdated],
    };

    expect(
      () =>
        new ProjectionDispatcher<PostEvent, PostDto>(
          'posts',
          table,
          allPostEventTypes,
          new InMemoryPostReadModel()
        )
    ).toThrow('mislabelled [PostLiked]');
  });
});
