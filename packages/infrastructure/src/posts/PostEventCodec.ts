import type { EventRecord } from '@postboard/application';
import {
  FatalSchemaError,
  UnknownEventTypeError,
  allPostEventTypes,
  postEventTypes,
  unknownEventType,
  type PostEvent,
  type PostEventType,
} from '@postboard/domain';
import { z } from 'zod';
import type { EventCodec, SerializedEvent } from '../eventing/types';

export const POST_AGGREGATE_TYPE = 'post';

const header = {
  aggregateId: z.string().min(1),
  version: z.number().int().positive(),
  occurredAt: z.number().int().nonnegative(),
};

const createdV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.postCreated),
  payload: z.object({ author: z.string(), message: z.string() }),
});

const messageUpdatedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.messageUpdated),
  payload: z.object({ message: z.string() }),
});

const likedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.postLiked),
  payload: z.object({}),
});

const commentAddedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.commentAdded),
  payload: z.object({
    commentId: z.string().min(1),
    comment: z.string(),
    username: z.string(),
  }),
});

const commentUpdatedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.commentUpdated),
  payload: z.object({
    commentId: z.string().min(1),
    comment: z.string(),
    username: z.string(),
  }),
});

const commentRemovedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.commentRemoved),
  payload: z.object({ commentId: z.string().min(1) }),
});

const postRemovedV1 = z.object({
  ...header,
  eventType: z.literal(postEventTypes.postRemoved),
  payload: z.object({ username: z.string() }),
});

const wireSchema = z.discriminatedUnion('eventType', [
  createdV1,
  messageUpdatedV1,
  likedV1,
  commentAddedV1,
  commentUpdatedV1,
  commentRemovedV1,
  postRemovedV1,
]);

type WirePostEvent = z.infer<typeof wireSchema>;

const discriminator = z.object({ eventType: z.string() });

const isPostEventType = (value: string): value is PostEventType =>
  allPostEventTypes.some((type) => type === value);

const payloadOf = (event: PostEvent): Record<string, unknown> => {
  switch (event.eventType) {
    case postEventTypes.postCreated:
      return { author: event.author, message: event.message };
    case postEventTypes.messageUpdated:
      return { message: event.message };
    case postEventTypes.postLiked:
      return {};
    case postEventTypes.commentAdded:
    case postEventTypes.commentUpdated:
      return {
        commentId: event.commentId,
        comment: event.comment,
        username: event.username,
      };
    case postEventTypes.commentRemoved:
      return { commentId: event.commentId };
    case postEventTypes.postRemoved:
      return { username: event.username };
    default:
      return unknownEventType(event);
  }
};

const toDomain = (wire: WirePostEvent): PostEvent => {
  const meta = { aggregateId: wire.aggregateId, occurredAt: wire.occurredAt };
  switch (wire.eventType) {
    case postEventTypes.postCreated:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    case postEventTypes.messageUpdated:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    case postEventTypes.postLiked:
      return { eventType: wire.eventType, ...meta };
    case postEventTypes.commentAdded:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    case postEventTypes.commentUpdated:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    case postEventTypes.commentRemoved:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    case postEventTypes.postRemoved:
      return { eventType: wire.eventType, ...meta, ...wire.payload };
    default:
      return unknownEventType(wire);
  }
};

export const PostEventCodec: EventCodec<PostEvent> = {
  aggregateType: POST_AGGREGATE_TYPE,
  eventTypes: allPostEventTypes,

  serialize(record: EventRecord<PostEvent>): SerializedEvent<PostEventType> {
    return {
      eventType: record.event.eventType,
      aggregateId: record.aggregateId,
      version: record.version,
      occurredAt: record.event.occurredAt,
      payload: payloadOf(record.event),
    };
  },

  deserialize(raw: unknown): EventRecord<PostEvent> {
    const head = discriminator.safeParse(raw);
    if (!head.success) {
      throw new FatalSchemaError('Event envelope has no eventType');
    }
    if (!isPostEventType(head.data.eventType)) {
      throw new UnknownEventTypeError(head.data.eventType);
    }
    const parsed = wireSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new FatalSchemaError(
        `Invalid payload for ${head.data.eventType}: ${issues}`
      );
    }
    return {
      aggregateId: parsed.data.aggregateId,
      version: parsed.data.version,
      event: toDomain(parsed.data),
    };
  },

  encode(record: EventRecord<PostEvent>): string {
    return JSON.stringify(PostEventCodec.serialize(record));
  },

  decode(text: string): EventRecord<PostEvent> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new FatalSchemaError(
        `Event is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return PostEventCodec.deserialize(raw);
  },
};
