import { ValidationError } from './CommandResult';
import { ValidationException } from '../../errors/ValidationError';

type FieldParser<TCommand, TResult> = (command: TCommand) => TResult;

type ParsedFromSpec<
  TCommand,
  TSpec extends Record<string, FieldParser<TCommand, unknown>>,
> = {
  [TKey in keyof TSpec]: TSpec[TKey] extends FieldParser<
    TCommand,
    infer TResult
  >
    ? TResult
    : never;
};

/**
 * Base class for command handlers that check the shape of incoming commands
 * while collecting structured validation errors.
 */
export abstract class BaseCommandHandler {
  /**
   * Parse a command according to a field specification.
   *
   * Every parser runs; failures are collected and re-thrown together as a
   * ValidationException with field-scoped messages.
   */
  protected parseCommand<
    TCommand,
    TSpec extends Record<string, FieldParser<TCommand, unknown>>,
  >(command: TCommand, spec: TSpec): ParsedFromSpec<TCommand, TSpec> {
    const errors: ValidationError[] = [];
    const entries: Array<[string, unknown]> = [];

    for (const field of Object.keys(spec)) {
      const parser = spec[field];
      try {
        entries.push([field, parser(command)]);
      } catch (error) {
        const message =
          error instanceof Error ? error.message : 'Invalid value';
        errors.push({ field, message });
      }
    }

    if (errors.length > 0) {
      throw new ValidationException(errors);
    }

    return Object.fromEntries(entries) as ParsedFromSpec<TCommand, TSpec>;
  }

  protected parseIdentifier(value: unknown): string {
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new Error('must be a non-empty string');
    }
    if (value.length > 200) {
      throw new Error('must be at most 200 characters');
    }
    return value;
  }

  protected parseText(value: unknown): string {
    if (typeof value !== 'string') {
      throw new Error('must be a string');
    }
    return value;
  }
}
