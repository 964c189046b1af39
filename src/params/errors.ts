/**
 * Error types for parameter coercion.
 */

/**
 * Thrown by a coercer when a raw value is not acceptable.
 *
 * The binder treats this error exactly like a missing parameter: the
 * resolution ends as NotFound. Any other error thrown from a coercer is
 * treated as a programming error and propagates.
 *
 * @example
 * ```typescript
 * const even: Coercer<number> = (raw) => {
 *   const value = int(raw);
 *   if (value % 2 !== 0) throw new InvalidInputError(raw, 'expected an even number');
 *   return value;
 * };
 * ```
 */
export class InvalidInputError extends Error {
  readonly raw: string;

  constructor(raw: string, message = `Invalid input: '${raw}'`) {
    super(message);
    this.name = 'InvalidInputError';
    this.raw = raw;
  }
}
