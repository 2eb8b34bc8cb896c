import { unknownEventType } from '../shared/errors';
import type { PostEvent } from './events/PostEvents';
import { postEventTypes } from './events/eventTypes';

export type PostComment = Readonly<{
  comment: string;
  username: string;
}>;

export type PostState = Readonly<{
  active: boolean;
  author: string;
  message: string;
  likes: number;
  comments: ReadonlyMap<string, PostComment>;
}>;

export const initialPostState: PostState = {
  active: false,
  author: '',
  message: '',
  likes: 0,
  comments: new Map(),
};

const putComment = (
  state: PostState,
  commentId: string,
  comment: PostComment
): PostState => {
  const comments = new Map(state.comments);
  comments.set(commentId, comment);
  return { ...state, comments };
};

const dropComment = (state: PostState, commentId: string): PostState => {
  const comments = new Map(state.comments);
  comments.delete(commentId);
  return { ...state, comments };
};

/**
 * Pure reducer for the Post aggregate.
 *
 * Total over the known event kinds; anything else means the stored stream and
 * this code disagree on the schema, which is fatal.
 */
export const applyPostEvent = (
  state: PostState,
  event: PostEvent
): PostState => {
  switch (event.eventType) {
    case postEventTypes.postCreated:
      return {
        ...state,
        active: true,
        author: event.author,
        message: event.message,
      };
    case postEventTypes.messageUpdated:
      return { ...state, message: event.message };
    case postEventTypes.postLiked:
      return { ...state, likes: state.likes + 1 };
    case postEventTypes.commentAdded:
    case postEventTypes.commentUpdated:
      return putComment(state, event.commentId, {
        comment: event.comment,
        username: event.username,
      });
    case postEventTypes.commentRemoved:
      return dropComment(state, event.commentId);
    case postEventTypes.postRemoved:
      return { ...state, active: false };
    default:
      return unknownEventType(event);
  }
};
