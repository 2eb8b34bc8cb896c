import type { CommentDto, EventRecord, PostDto } from '@postboard/application';
import {
  allPostEventTypes,
  postEventTypes,
  type PostEvent,
  type PostEventType,
} from '@postboard/domain';
import { on } from '../projection/handlers';
import { ProjectionDispatcher } from '../projection/ProjectionDispatcher';
import type {
  EventOfType,
  ProjectionHandler,
  ProjectionStore,
  ProjectionTable,
} from '../projection/types';

const onPost = <TType extends PostEventType>(
  eventType: TType,
  fn: (
    current: PostDto | null,
    record: EventRecord<EventOfType<PostEvent, TType>>
  ) => PostDto | null
): ProjectionHandler<PostEvent, PostDto> =>
  on<PostEvent, PostDto, TType>(eventType, fn);

const touch = (
  record: EventRecord<PostEvent>
): Pick<PostDto, 'version' | 'updatedAt'> => ({
  version: record.version,
  updatedAt: record.event.occurredAt,
});

const editComment = (
  comments: readonly CommentDto[],
  edit: Pick<CommentDto, 'commentId' | 'comment' | 'username'> & {
    editedAt: number;
  }
): CommentDto[] =>
  comments.map((existing) =>
    existing.commentId === edit.commentId
      ? {
          ...existing,
          comment: edit.comment,
          username: edit.username,
          edited: true,
          editedAt: edit.editedAt,
        }
      : existing
  );

/**
 * Event kind → post view transition. Every handler is pure; version
 * filtering happens in the dispatcher.
 */
export const postProjectionTable: ProjectionTable<PostEvent, PostDto> = {
  [postEventTypes.postCreated]: onPost(
    postEventTypes.postCreated,
    (_current, { aggregateId, version, event }) => ({
      postId: aggregateId,
      author: event.author,
      message: event.message,
      datePosted: event.occurredAt,
      likes: 0,
      comments: [],
      active: true,
      version,
      updatedAt: event.occurredAt,
    })
  ),
  [postEventTypes.messageUpdated]: onPost(
    postEventTypes.messageUpdated,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        message: record.event.message,
      }
  ),
  [postEventTypes.postLiked]: onPost(
    postEventTypes.postLiked,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        likes: current.likes + 1,
      }
  ),
  [postEventTypes.commentAdded]: onPost(
    postEventTypes.commentAdded,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        comments: [
          ...current.comments.filter(
            (existing) => existing.commentId !== record.event.commentId
          ),
          {
            commentId: record.event.commentId,
            username: record.event.username,
            comment: record.event.comment,
            commentDate: record.event.occurredAt,
            edited: false,
            editedAt: null,
          },
        ],
      }
  ),
  [postEventTypes.commentUpdated]: onPost(
    postEventTypes.commentUpdated,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        comments: editComment(current.comments, {
          commentId: record.event.commentId,
          comment: record.event.comment,
          username: record.event.username,
          editedAt: record.event.occurredAt,
        }),
      }
  ),
  [postEventTypes.commentRemoved]: onPost(
    postEventTypes.commentRemoved,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        comments: current.comments.filter(
          (existing) => existing.commentId !== record.event.commentId
        ),
      }
  ),
  [postEventTypes.postRemoved]: onPost(
    postEventTypes.postRemoved,
    (current, record) =>
      current && {
        ...current,
        ...touch(record),
        active: false,
      }
  ),
};

export const POST_PROJECTION = 'posts';

export const createPostProjectionDispatcher = (
  store: ProjectionStore<PostDto>
): ProjectionDispatcher<PostEvent, PostDto> =>
  new ProjectionDispatcher<PostEvent, PostDto>(
    POST_PROJECTION,
    postProjectionTable,
    allPostEventTypes,
    store
  );
