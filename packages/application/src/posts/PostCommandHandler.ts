import { randomUUID } from 'node:crypto';
import { Post, type PostEvent } from '@postboard/domain';
import { ConcurrencyError } from '../errors/ConcurrencyError';
import { BaseCommandHandler } from '../shared/ports/BaseCommandHandler';
import type { CommandOutcome } from '../shared/ports/CommandResult';
import type { ICommandHandler } from '../shared/ports/cqrsTypes';
import type { EventSourcedRepository } from '../shared/EventSourcedRepository';
import type {
  AddCommentCommand,
  CreatePostCommand,
  DeletePostCommand,
  EditCommentCommand,
  EditMessageCommand,
  LikePostCommand,
  PostCommand,
  RemoveCommentCommand,
} from './commands';
import { postCommandTypes } from './commands';

export type PostRepository = EventSourcedRepository<Post, PostEvent>;

export type AddCommentOutcome = CommandOutcome &
  Readonly<{ commentId: string }>;

export type PostCommandHandlerOptions = Readonly<{
  /** Attempts per command when the stream keeps moving underneath us. */
  maxAttempts?: number;
  clock?: () => number;
  newId?: () => string;
}>;

/**
 * Command intake for posts: load, mutate, append under the loaded version.
 *
 * A ConcurrencyError means another writer got there first; the command is
 * re-run from scratch against the longer stream.
 */
export class PostCommandHandler
  extends BaseCommandHandler
  implements ICommandHandler<PostCommand, CommandOutcome>
{
  private readonly maxAttempts: number;
  private readonly clock: () => number;
  private readonly newId: () => string;

  constructor(
    private readonly posts: PostRepository,
    options: PostCommandHandlerOptions = {}
  ) {
    super();
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.clock = options.clock ?? Date.now;
    this.newId = options.newId ?? randomUUID;
  }

  handle(command: PostCommand): Promise<CommandOutcome> {
    switch (command.type) {
      case postCommandTypes.createPost:
        return this.handleCreate(command);
      case postCommandTypes.editMessage:
        return this.handleEditMessage(command);
      case postCommandTypes.likePost:
        return this.handleLike(command);
      case postCommandTypes.addComment:
        return this.handleAddComment(command);
      case postCommandTypes.editComment:
        return this.handleEditComment(command);
      case postCommandTypes.removeComment:
        return this.handleRemoveComment(command);
      case postCommandTypes.deletePost:
        return this.handleDelete(command);
      default: {
        const unsupported: never = command;
        return Promise.reject(
          new Error(`Unsupported post command: ${JSON.stringify(unsupported)}`)
        );
      }
    }
  }

  /**
   * Creation is not retried: a conflict means the id is already taken.
   */
  async handleCreate(command: CreatePostCommand): Promise<CommandOutcome> {
    const { postId, author, message } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
      author: (c) => this.parseText(c.author),
      message: (c) => this.parseText(c.message),
    });

    const post = Post.create({
      id: postId,
      author,
      message,
      postedAt: this.clock(),
    });
    await this.posts.save(post);
    return { aggregateId: post.id, version: post.version };
  }

  async handleEditMessage(
    command: EditMessageCommand
  ): Promise<CommandOutcome> {
    const { postId, message } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
      message: (c) => this.parseText(c.message),
    });
    return this.mutate(postId, (post, now) =>
      post.editMessage({ message, editedAt: now })
    );
  }

  async handleLike(command: LikePostCommand): Promise<CommandOutcome> {
    const { postId } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
    });
    return this.mutate(postId, (post, now) => post.likePost({ likedAt: now }));
  }

  async handleAddComment(
    command: AddCommentCommand
  ): Promise<AddCommentOutcome> {
    const { postId, comment, username } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
      comment: (c) => this.parseText(c.comment),
      username: (c) => this.parseText(c.username),
    });
    const commentId = this.newId();
    const outcome = await this.mutate(postId, (post, now) =>
      post.addComment({ commentId, comment, username, commentedAt: now })
    );
    return { ...outcome, commentId };
  }

  async handleEditComment(
    command: EditCommentCommand
  ): Promise<CommandOutcome> {
    const { postId, commentId, comment, username } = this.parseCommand(
      command,
      {
        postId: (c) => this.parseIdentifier(c.postId),
        commentId: (c) => this.parseIdentifier(c.commentId),
        comment: (c) => this.parseText(c.comment),
        username: (c) => this.parseText(c.username),
      }
    );
    return this.mutate(postId, (post, now) =>
      post.editComment({ commentId, comment, username, editedAt: now })
    );
  }

  async handleRemoveComment(
    command: RemoveCommentCommand
  ): Promise<CommandOutcome> {
    const { postId, commentId, username } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
      commentId: (c) => this.parseIdentifier(c.commentId),
      username: (c) => this.parseText(c.username),
    });
    return this.mutate(postId, (post, now) =>
      post.removeComment({ commentId, username, removedAt: now })
    );
  }

  async handleDelete(command: DeletePostCommand): Promise<CommandOutcome> {
    const { postId, username } = this.parseCommand(command, {
      postId: (c) => this.parseIdentifier(c.postId),
      username: (c) => this.parseText(c.username),
    });
    return this.mutate(postId, (post, now) =>
      post.deletePost({ username, deletedAt: now })
    );
  }

  private async mutate(
    postId: string,
    change: (post: Post, now: number) => void
  ): Promise<CommandOutcome> {
    for (let attempt = 1; ; attempt++) {
      const post = await this.posts.load(postId);
      change(post, this.clock());
      try {
        await this.posts.save(post);
        return { aggregateId: post.id, version: post.version };
      } catch (error) {
        if (error instanceof ConcurrencyError && attempt < this.maxAttempts) {
          continue;
        }
        throw error;
      }
    }
  }
}
