export const postEventTypes = {
  postCreated: 'PostCreated',
  messageUpdated: 'MessageUpdated',
  postLiked: 'PostLiked',
  commentAdded: 'CommentAdded',
  commentUpdated: 'CommentUpdated',
  commentRemoved: 'CommentRemoved',
  postRemoved: 'PostRemoved',
} as const;

export type PostEventType =
  (typeof postEventTypes)[keyof typeof postEventTypes];

export const allPostEventTypes: readonly PostEventType[] =
  Object.values(postEventTypes);
