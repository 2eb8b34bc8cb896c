import { ValidationException } from '../errors/ValidationError';
import type { IQueryHandler } from '../shared/ports/cqrsTypes';
import type { PostDto } from './dtos';
import type { PostReadModelPort } from './ports/PostReadModelPort';
import type { PostQuery } from './queries';
import { postQueryTypes } from './queries';

export type PostQueryResult = PostDto[] | PostDto | null;

export class PostQueryHandler
  implements IQueryHandler<PostQuery, PostQueryResult>
{
  constructor(private readonly readModel: PostReadModelPort) {}

  execute(query: PostQuery): Promise<PostQueryResult> {
    switch (query.type) {
      case postQueryTypes.getPostById:
        return this.readModel.getById(query.postId);
      case postQueryTypes.listPosts:
        return this.readModel.list();
      case postQueryTypes.listPostsByAuthor:
        return this.readModel.list({ author: query.author });
      case postQueryTypes.listPostsWithComments:
        return this.readModel.list({ withComments: true });
      case postQueryTypes.listPostsWithLikes:
        if (!Number.isInteger(query.minLikes) || query.minLikes < 0) {
          return Promise.reject(
            new ValidationException([
              {
                field: 'minLikes',
                message: 'must be a non-negative integer',
              },
            ])
          );
        }
        return this.readModel.list({ minLikes: query.minLikes });
      default: {
        const unsupported: never = query;
        return Promise.reject(
          new Error(`Unsupported post query: ${JSON.stringify(unsupported)}`)
        );
      }
    }
  }
}
