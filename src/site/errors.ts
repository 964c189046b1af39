/**
 * Error types raised at the Site level.
 */

import { RoutingError } from '../resolver/errors.js';
import { splitPath } from '../request/split-path.js';

/**
 * Thrown by a page to have {@link Site.dispatch} resolve another path.
 *
 * The rewritten path keeps the named values of the original request.
 *
 * @example
 * ```typescript
 * page('old-news', [], () => {
 *   throw new PathRewrite('/news');
 * });
 * ```
 */
export class PathRewrite extends Error {
  readonly segments: readonly string[];

  constructor(path: string | readonly string[]) {
    const segments = typeof path === 'string' ? splitPath(path) : [...path];
    super(`Rewrite to /${segments.join('/')}`);
    this.name = 'PathRewrite';
    this.segments = segments;
  }
}

/**
 * A dispatch followed more rewrites than the site allows.
 */
export class RewriteLimitError extends RoutingError {
  readonly maxRewrites: number;

  constructor(maxRewrites: number, options?: ErrorOptions) {
    super(`Exceeded the limit of ${maxRewrites} path rewrites`, options);
    this.name = 'RewriteLimitError';
    this.maxRewrites = maxRewrites;
  }
}

/**
 * Invalid site configuration.
 */
export class SiteConfigError extends RoutingError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid site option '${option}': ${message}`);
    this.name = 'SiteConfigError';
    this.option = option;
  }
}
