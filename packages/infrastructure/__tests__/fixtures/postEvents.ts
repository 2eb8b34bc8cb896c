import type { EventRecord } from '@postboard/application';
import { postEventTypes, type PostEvent } from '@postboard/domain';

export const created = (
  aggregateId: string,
  occurredAt = 1_000,
  author = 'alice'
): PostEvent => ({
  eventType: postEventTypes.postCreated,
  aggregateId,
  occurredAt,
  author,
  message: 'hi',
});

export const liked = (aggregateId: string, occurredAt = 2_000): PostEvent => ({
  eventType: postEventTypes.postLiked,
  aggregateId,
  occurredAt,
});

export const commentAdded = (
  aggregateId: string,
  commentId: string,
  occurredAt = 3_000
): PostEvent => ({
  eventType: postEventTypes.commentAdded,
  aggregateId,
  occurredAt,
  commentId,
  comment: 'nice',
  username: 'bob',
});

export const removed = (aggregateId: string, occurredAt = 9_000): PostEvent => ({
  eventType: postEventTypes.postRemoved,
  aggregateId,
  occurredAt,
  username: 'alice',
});

/** Number events 1..n as one stream. */
export const stream = (
  ...events: PostEvent[]
): EventRecord<PostEvent>[] =>
  events.map((event, index) => ({
    aggregateId: event.aggregateId,
    version: index + 1,
    event,
  }));
