export type ValidationError = {
  readonly field: string;
  readonly message: string;
};

/**
 * What a successful command reports back: the stream it touched and the
 * version it left the stream at.
 */
export type CommandOutcome = Readonly<{
  aggregateId: string;
  version: number;
}>;
