import type {
  PostDto,
  PostListFilter,
  PostReadModelPort,
} from '@postboard/application';
import type { ProjectionStore } from '../projection/types';

export const byNewest = (a: PostDto, b: PostDto): number =>
  b.datePosted - a.datePosted || a.postId.localeCompare(b.postId);

export class InMemoryPostReadModel
  implements PostReadModelPort, ProjectionStore<PostDto>
{
  private readonly views = new Map<string, PostDto>();

  async get(postId: string): Promise<PostDto | null> {
    return this.views.get(postId) ?? null;
  }

  async save(postId: string, view: PostDto): Promise<void> {
    const existing = this.views.get(postId);
    if (existing && existing.version >= view.version) return;
    this.views.set(postId, view);
  }

  async getById(postId: string): Promise<PostDto | null> {
    const view = this.views.get(postId);
    return view && view.active ? view : null;
  }

  async list(filter: PostListFilter = {}): Promise<PostDto[]> {
    const authorKey = filter.author?.toLowerCase();
    return [...this.views.values()]
      .filter((view) => view.active)
      .filter(
        (view) =>
          authorKey === undefined || view.author.toLowerCase() === authorKey
      )
      .filter((view) => !filter.withComments || view.comments.length > 0)
      .filter(
        (view) => filter.minLikes === undefined || view.likes >= filter.minLikes
      )
      .sort(byNewest);
  }
}
