/**
 * Error types for path resolution.
 *
 * Resolution knows two outcomes besides success: NotFound, which the Site
 * answers by trying the next root, and everything else, which is an
 * application error and propagates unchanged.
 */

import type { TraceEntry } from './context.js';

/**
 * Base error class for errors raised by the routing core itself.
 */
export class RoutingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RoutingError';
  }
}

/**
 * Result of resolving against one root, kept for diagnostics.
 */
export interface RootAttempt {
  root: string;
  reason: string;
}

/**
 * No handler matched the path, or its arguments could not be bound.
 *
 * Unmatched routes and invalid input are reported the same
 * way; `reason` and `trace` are for logs, not for clients.
 */
export class NotFoundError extends RoutingError {
  readonly reason: string;
  readonly trace: readonly TraceEntry[];
  readonly attempts: readonly RootAttempt[];

  constructor(
    reason: string,
    details: { trace?: readonly TraceEntry[]; attempts?: readonly RootAttempt[] } = {}
  ) {
    super(`Not found: ${reason}`);
    this.name = 'NotFoundError';
    this.reason = reason;
    this.trace = details.trace ?? [];
    this.attempts = details.attempts ?? [];
  }
}

/**
 * A method-keyed resource has no page for the request method.
 *
 * Unlike NotFound this ends the resolution: the path did match, so later
 * roots are not tried.
 */
export class MethodNotAllowedError extends RoutingError {
  readonly method: string;
  /** Upper-case methods the resource answers */
  readonly allowed: readonly string[];
  readonly trace: readonly TraceEntry[];

  constructor(method: string, allowed: readonly string[], trace: readonly TraceEntry[] = []) {
    super(`Method not allowed: ${method} (allowed: ${allowed.join(', ')})`);
    this.name = 'MethodNotAllowedError';
    this.method = method;
    this.allowed = allowed;
    this.trace = trace;
  }
}

/**
 * The request's AbortSignal fired before a handler was invoked.
 */
export class ResolutionAbortedError extends RoutingError {
  constructor(cause: unknown) {
    super('Resolution aborted', { cause });
    this.name = 'ResolutionAbortedError';
  }
}

/**
 * A locator returned something other than a Resource.
 */
export class LocatorResultError extends RoutingError {
  readonly resourceName: string;
  readonly locatorName: string;

  constructor(resourceName: string, locatorName: string) {
    super(`Locator '${locatorName}' of resource '${resourceName}' did not return a Resource`);
    this.name = 'LocatorResultError';
    this.resourceName = resourceName;
    this.locatorName = locatorName;
  }
}
