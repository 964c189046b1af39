/**
 * Dispatch outcomes.
 */

import type { MethodNotAllowedError, NotFoundError } from '../resolver/errors.js';
import type { OutcomeKind } from '../types/outcome.js';
import type { ValueSource } from '../params/value-bag.js';

export interface FoundOutcome {
  kind: OutcomeKind.FOUND;
  value: unknown;
  /** Segments of the path that produced the value, after rewrites */
  segments: readonly string[];
  rewrites: number;
}

export interface NotFoundOutcome {
  kind: OutcomeKind.NOT_FOUND;
  error: NotFoundError;
}

export interface MethodNotAllowedOutcome {
  kind: OutcomeKind.METHOD_NOT_ALLOWED;
  error: MethodNotAllowedError;
}

export interface ApplicationErrorOutcome {
  kind: OutcomeKind.APPLICATION_ERROR;
  error: unknown;
}

/**
 * Result of {@link Site.dispatch}. Transports switch on `kind`.
 */
export type DispatchOutcome =
  | FoundOutcome
  | NotFoundOutcome
  | MethodNotAllowedOutcome
  | ApplicationErrorOutcome;

/**
 * Options for {@link Site.resolve} and {@link Site.dispatch}.
 */
export interface SiteResolveOptions {
  /** Aborts the resolution before the next handler invocation */
  signal?: AbortSignal;
  /** Request method; a method carried by the request takes precedence */
  method?: string;
}

/**
 * Input accepted by {@link Site.dispatch} in place of a RouteRequest.
 */
export interface DispatchInput {
  path: string | readonly string[];
  values?: ValueSource;
  method?: string;
}
