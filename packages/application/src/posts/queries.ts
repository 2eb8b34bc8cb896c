import type { IQuery } from '../shared/ports/cqrsTypes';

export const postQueryTypes = {
  getPostById: 'GetPostById',
  listPosts: 'ListPosts',
  listPostsByAuthor: 'ListPostsByAuthor',
  listPostsWithComments: 'ListPostsWithComments',
  listPostsWithLikes: 'ListPostsWithLikes',
} as const;

export interface GetPostByIdQuery
  extends IQuery<typeof postQueryTypes.getPostById> {
  readonly postId: string;
}

export type ListPostsQuery = IQuery<typeof postQueryTypes.listPosts>;

export interface ListPostsByAuthorQuery
  extends IQuery<typeof postQueryTypes.listPostsByAuthor> {
  readonly author: string;
}

export type ListPostsWithCommentsQuery = IQuery<
  typeof postQueryTypes.listPostsWithComments
>;

export interface ListPostsWithLikesQuery
  extends IQuery<typeof postQueryTypes.listPostsWithLikes> {
  readonly minLikes: number;
}

export type PostListQuery =
  | ListPostsQuery
  | ListPostsByAuthorQuery
  | ListPostsWithCommentsQuery
  | ListPostsWithLikesQuery;

export type PostQuery = GetPostByIdQuery | PostListQuery;
