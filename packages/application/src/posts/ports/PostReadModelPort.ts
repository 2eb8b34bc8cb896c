import type { PostDto } from '../dtos';

export type PostListFilter = Readonly<{
  /** Case-insensitive author match. */
  author?: string;
  withComments?: boolean;
  minLikes?: number;
}>;

/**
 * Query-side access to the post projection. Removed posts are never returned.
 */
export interface PostReadModelPort {
  getById(postId: string): Promise<PostDto | null>;

  list(filter?: PostListFilter): Promise<PostDto[]>;
}
