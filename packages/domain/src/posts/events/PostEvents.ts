import type { DomainEvent } from '../../shared/DomainEvent';
import { postEventTypes } from './eventTypes';

export type PostCreated = DomainEvent<typeof postEventTypes.postCreated> &
  Readonly<{
    author: string;
    message: string;
  }>;

export type MessageUpdated = DomainEvent<
  typeof postEventTypes.messageUpdated
> &
  Readonly<{
    message: string;
  }>;

export type PostLiked = DomainEvent<typeof postEventTypes.postLiked>;

export type CommentAdded = DomainEvent<typeof postEventTypes.commentAdded> &
  Readonly<{
    commentId: string;
    comment: string;
    username: string;
  }>;

export type CommentUpdated = DomainEvent<
  typeof postEventTypes.commentUpdated
> &
  Readonly<{
    commentId: string;
    comment: string;
    username: string;
  }>;

export type CommentRemoved = DomainEvent<
  typeof postEventTypes.commentRemoved
> &
  Readonly<{
    commentId: string;
  }>;

export type PostRemoved = DomainEvent<typeof postEventTypes.postRemoved> &
  Readonly<{
    username: string;
  }>;

export type PostEvent =
  | PostCreated
  | MessageUpdated
  | PostLiked
  | CommentAdded
  | CommentUpdated
  | CommentRemoved
  | PostRemoved;
