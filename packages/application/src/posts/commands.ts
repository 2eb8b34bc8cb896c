import type { ICommand } from '../shared/ports/cqrsTypes';

export const postCommandTypes = {
  createPost: 'CreatePost',
  editMessage: 'EditMessage',
  likePost: 'LikePost',
  addComment: 'AddComment',
  editComment: 'EditComment',
  removeComment: 'RemoveComment',
  deletePost: 'DeletePost',
} as const;

export type PostCommandType =
  (typeof postCommandTypes)[keyof typeof postCommandTypes];

export interface CreatePostCommand
  extends ICommand<typeof postCommandTypes.createPost> {
  readonly postId: string;
  readonly author: string;
  readonly message: string;
}

export interface EditMessageCommand
  extends ICommand<typeof postCommandTypes.editMessage> {
  readonly postId: string;
  readonly message: string;
}

export interface LikePostCommand
  extends ICommand<typeof postCommandTypes.likePost> {
  readonly postId: string;
}

export interface AddCommentCommand
  extends ICommand<typeof postCommandTypes.addComment> {
  readonly postId: string;
  readonly comment: string;
  readonly username: string;
}

export interface EditCommentCommand
  extends ICommand<typeof postCommandTypes.editComment> {
  readonly postId: string;
  readonly commentId: string;
  readonly comment: string;
  readonly username: string;
}

export interface RemoveCommentCommand
  extends ICommand<typeof postCommandTypes.removeComment> {
  readonly postId: string;
  readonly commentId: string;
  readonly username: string;
}

export interface DeletePostCommand
  extends ICommand<typeof postCommandTypes.deletePost> {
  readonly postId: string;
  readonly username: string;
}

export type PostCommand =
  | CreatePostCommand
  | EditMessageCommand
  | LikePostCommand
  | AddCommentCommand
  | EditCommentCommand
  | RemoveCommentCommand
  | DeletePostCommand;
