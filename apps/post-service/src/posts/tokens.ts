export const POST_EVENT_STORE = Symbol('POST_EVENT_STORE');
export const POST_EVENT_PUBLISHER = Symbol('POST_EVENT_PUBLISHER');
export const POST_REPOSITORY = Symbol('POST_REPOSITORY');
export const POST_READ_MODEL = Symbol('POST_READ_MODEL');
export const CONSUMER_OFFSETS = Symbol('CONSUMER_OFFSETS');
