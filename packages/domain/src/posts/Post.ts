import { AggregateRoot } from '../shared/AggregateRoot';
import { Assert } from '../shared/Assert';
import {
  CommentNotFoundError,
  InactiveAggregateError,
  UnauthorizedError,
} from '../shared/errors';
import type { PostComment, PostState } from './PostState';
import { applyPostEvent, initialPostState } from './PostState';
import type { PostEvent } from './events/PostEvents';
import { postEventTypes } from './events/eventTypes';

/**
 * Post aggregate root.
 *
 * Invariants enforced:
 * - Author, message, comment and username text must not be blank
 * - A removed post rejects every further mutation (soft delete)
 * - Only a comment's author may edit or remove it
 * - Only the post's author may remove the post
 *
 * User names are compared case-insensitively.
 *
 * @example
 * ```typescript
 * const post = Post.create({
 *   id: 'post-1',
 *   author: 'alice',
 *   message: 'hi',
 *   postedAt: Date.now(),
 * });
 * post.addComment({
 *   commentId: 'comment-1',
 *   comment: 'nice',
 *   username: 'bob',
 *   commentedAt: Date.now(),
 * });
 * ```
 */
export class Post extends AggregateRoot<PostState, PostEvent> {
  private constructor(id: string) {
    super(id, initialPostState, applyPostEvent);
  }

  /**
   * Rebuild a Post from its persisted stream.
   */
  static rehydrate(id: string, events: readonly PostEvent[]): Post {
    const post = new Post(id);
    post.replay(events);
    return post;
  }

  static create(params: {
    id: string;
    author: string;
    message: string;
    postedAt: number;
  }): Post {
    Assert.that(params.id, 'id').isNonEmpty();
    Assert.that(params.author, 'author').isNotBlank();
    Assert.that(params.message, 'message').isNotBlank();
    Assert.that(params.postedAt, 'postedAt')
      .isInteger()
      .isGreaterThanOrEqual(0);

    const post = new Post(params.id);
    post.raiseEvent({
      eventType: postEventTypes.postCreated,
      aggregateId: params.id,
      occurredAt: params.postedAt,
      author: params.author,
      message: params.message,
    });
    return post;
  }

  // === Getters ===

  get active(): boolean {
    return this.state.active;
  }

  get author(): string {
    return this.state.author;
  }

  get message(): string {
    return this.state.message;
  }

  get likes(): number {
    return this.state.likes;
  }

  get comments(): ReadonlyMap<string, PostComment> {
    return this.state.comments;
  }

  // === Commands ===

  editMessage(params: { message: string; editedAt: number }): void {
    this.assertActive();
    Assert.that(params.message, 'message').isNotBlank();

    this.raiseEvent({
      eventType: postEventTypes.messageUpdated,
      aggregateId: this.id,
      occurredAt: params.editedAt,
      message: params.message,
    });
  }

  likePost(params: { likedAt: number }): void {
    this.assertActive();

    this.raiseEvent({
      eventType: postEventTypes.postLiked,
      aggregateId: this.id,
      occurredAt: params.likedAt,
    });
  }

  addComment(params: {
    commentId: string;
    comment: string;
    username: string;
    commentedAt: number;
  }): void {
    this.assertActive();
    Assert.that(params.comment, 'comment').isNotBlank();
    Assert.that(params.username, 'username').isNotBlank();
    Assert.that(params.commentId, 'commentId').isNonEmpty();

    this.raiseEvent({
      eventType: postEventTypes.commentAdded,
      aggregateId: this.id,
      occurredAt: params.commentedAt,
      commentId: params.commentId,
      comment: params.comment,
      username: params.username,
    });
  }

  /**
   * @throws {UnauthorizedError} unless `username` wrote the comment
   */
  editComment(params: {
    commentId: string;
    comment: string;
    username: string;
    editedAt: number;
  }): void {
    this.assertActive();
    Assert.that(params.comment, 'comment').isNotBlank();
    Assert.that(params.username, 'username').isNotBlank();
    const existing = this.requireComment(params.commentId);
    this.assertSameUser(
      existing.username,
      params.username,
      'You are not allowed to edit a comment that was made by another user'
    );

    this.raiseEvent({
      eventType: postEventTypes.commentUpdated,
      aggregateId: this.id,
      occurredAt: params.editedAt,
      commentId: params.commentId,
      comment: params.comment,
      username: params.username,
    });
  }

  /**
   * @throws {UnauthorizedError} unless `username` wrote the comment
   */
  removeComment(params: {
    commentId: string;
    username: string;
    removedAt: number;
  }): void {
    this.assertActive();
    Assert.that(params.username, 'username').isNotBlank();
    const existing = this.requireComment(params.commentId);
    this.assertSameUser(
      existing.username,
      params.username,
      'You are not allowed to remove a comment that was made by another user'
    );

    this.raiseEvent({
      eventType: postEventTypes.commentRemoved,
      aggregateId: this.id,
      occurredAt: params.removedAt,
      commentId: params.commentId,
    });
  }

  /**
   * Soft delete: history stays, later mutations are rejected.
   *
   * @throws {UnauthorizedError} unless `username` is the post's author
   */
  deletePost(params: { username: string; deletedAt: number }): void {
    this.assertActive();
    Assert.that(params.username, 'username').isNotBlank();
    this.assertSameUser(
      this.state.author,
      params.username,
      'You are not allowed to delete a post that was made by someone else'
    );

    this.raiseEvent({
      eventType: postEventTypes.postRemoved,
      aggregateId: this.id,
      occurredAt: params.deletedAt,
      username: params.username,
    });
  }

  // === Helpers ===

  private assertActive(): void {
    if (!this.state.active) {
      throw new InactiveAggregateError(this.id);
    }
  }

  private requireComment(commentId: string): PostComment {
    const comment = this.state.comments.get(commentId);
    if (!comment) {
      throw new CommentNotFoundError(commentId);
    }
    return comment;
  }

  private assertSameUser(
    expected: string,
    actual: string,
    message: string
  ): void {
    if (expected.toLowerCase() !== actual.toLowerCase()) {
      throw new UnauthorizedError(message);
    }
  }
}
