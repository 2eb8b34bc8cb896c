export type CommentDto = {
  commentId: string;
  username: string;
  comment: string;
  commentDate: number;
  edited: boolean;
  editedAt: number | null;
};

/**
 * Denormalized read-side view of a post.
 *
 * `version` is the stream version the view reflects; it is what makes
 * redelivered events harmless.
 */
export type PostDto = {
  postId: string;
  author: string;
  message: string;
  datePosted: number;
  likes: number;
  comments: CommentDto[];
  active: boolean;
  version: number;
  updatedAt: number;
};
