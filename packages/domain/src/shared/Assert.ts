import { InvalidArgumentError } from './errors';

/**
 * Fluent assertion DSL for domain invariants.
 *
 * @example
 * ```typescript
 * Assert.that(message, 'message').isNotBlank();
 * Assert.that(postedAt, 'postedAt').isInteger().isGreaterThanOrEqual(0);
 * ```
 */
export class Assert<T> {
  private constructor(
    private readonly value: T,
    private readonly name?: string
  ) {}

  static that<T>(value: T, name?: string): Assert<T> {
    return new Assert(value, name);
  }

  // === String Assertions ===

  isNonEmpty(): this {
    if (typeof this.value !== 'string' || this.value.length === 0) {
      this.fail('must be a non-empty string');
    }
    return this;
  }

  isNotBlank(): this {
    if (typeof this.value !== 'string' || this.value.trim().length === 0) {
      this.fail('cannot be empty or whitespace');
    }
    return this;
  }

  // === Number Assertions ===

  isInteger(): this {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      this.fail('must be an integer');
    }
    return this;
  }

  isGreaterThanOrEqual(min: number): this {
    if (typeof this.value !== 'number' || this.value < min) {
      this.fail(`must be greater than or equal to ${min}`);
    }
    return this;
  }

  private fail(rule: string): never {
    const subject = this.name ?? 'Value';
    throw new InvalidArgumentError(`${subject} ${rule}`, this.name);
  }
}
