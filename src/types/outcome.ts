/**
 * Outcome classification for dispatched requests.
 *
 * Transports map these to their own status codes; {@link statusCodeFor}
 * gives the HTTP mapping.
 */
export enum OutcomeKind {
  /**
   * A handler produced a value.
   */
  FOUND = 'found',

  /**
   * No root matched the path, or arguments could not be bound.
   * Unmatched routes and invalid input are not distinguished.
   */
  NOT_FOUND = 'not_found',

  /**
   * The path reached a method-keyed resource that does not answer the
   * request method.
   */
  METHOD_NOT_ALLOWED = 'method_not_allowed',

  /**
   * A handler body, preprocessor, postprocessor or locator raised an error.
   */
  APPLICATION_ERROR = 'application_error',
}

/**
 * Check if a string is one of the outcome kinds.
 *
 * @example
 * isOutcomeKind('not_found'); // true
 * isOutcomeKind('teapot');    // false
 */
export function isOutcomeKind(value: string): value is OutcomeKind {
  return Object.values<string>(OutcomeKind).includes(value);
}

/**
 * HTTP status code conventionally used for an outcome kind.
 *
 * @example
 * statusCodeFor(OutcomeKind.NOT_FOUND); // 404
 */
export function statusCodeFor(kind: OutcomeKind): number {
  switch (kind) {
    case OutcomeKind.FOUND:
      return 200;
    case OutcomeKind.NOT_FOUND:
      return 404;
    case OutcomeKind.METHOD_NOT_ALLOWED:
      return 405;
    case OutcomeKind.APPLICATION_ERROR:
      return 500;
  }
}
