/**
 * Site: ordered root resources with fallback on NotFound.
 *
 * Roots are tried in order and the first to produce a value wins. A root
 * that answers NotFound hands the request to the next one; any other error
 * ends the resolution immediately, so later roots never run after an
 * application error or a MethodNotAllowed answer.
 *
 * @example
 * ```typescript
 * const site = new Site([app, legacy], { maxRewrites: 4 });
 *
 * site.events.on('resolution.root_missed', ({ root, reason }) => {
 *   console.log(`${root} missed: ${reason}`);
 * });
 *
 * const outcome = await site.dispatch(requestFromUrl('/forum/12/topic/10?offset=20'));
 * if (outcome.kind === OutcomeKind.FOUND) {
 *   respond(statusCodeFor(outcome.kind), outcome.value);
 * }
 * ```
 */

import { randomUUID } from 'node:crypto';
import { SiteEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { toValueBag, type ValueSource } from '../params/value-bag.js';
import { type RouteRequest, requestFromUrl } from '../request/request.js';
import { splitPath } from '../request/split-path.js';
import type { TraceEntry } from '../resolver/context.js';
import { MethodNotAllowedError, NotFoundError, type RootAttempt } from '../resolver/errors.js';
import { Resolver } from '../resolver/resolver.js';
import { Resource } from '../resource/resource.js';
import { OutcomeKind } from '../types/outcome.js';
import { type ResolvedSiteConfig, resolveSiteConfig, type SiteConfig } from './config.js';
import { PathRewrite, RewriteLimitError, SiteConfigError } from './errors.js';
import type { DispatchInput, DispatchOutcome, SiteResolveOptions } from './types.js';

const log = createLogger({ component: 'site' });

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRouteRequest(input: RouteRequest | DispatchInput): input is RouteRequest {
  return 'segments' in input;
}

function toRouteRequest(input: RouteRequest | DispatchInput | string, method: string | undefined): RouteRequest {
  if (typeof input === 'string') {
    return requestFromUrl(input, method === undefined ? {} : { method });
  }
  if (isRouteRequest(input)) {
    return input;
  }
  const request: RouteRequest = {
    segments: typeof input.path === 'string' ? splitPath(input.path) : input.path,
    values: toValueBag(input.values),
  };
  return input.method === undefined ? request : { ...request, method: input.method };
}

/**
 * Ordered list of root resources.
 */
export class Site {
  /** Resolution lifecycle events */
  readonly events: SiteEventEmitter = new SiteEventEmitter();

  readonly config: ResolvedSiteConfig;

  private readonly resolvers: readonly Resolver[];

  /**
   * @throws SiteConfigError if a root is not a Resource or an option is invalid
   */
  constructor(roots: readonly Resource[], config: SiteConfig = {}) {
    this.config = resolveSiteConfig(config);

    roots.forEach((root, position) => {
      if (!(root instanceof Resource)) {
        throw new SiteConfigError('roots', `root at position ${position} is not a Resource`);
      }
    });

    this.resolvers = roots.map((root) => new Resolver(root));
  }

  /**
   * Root resources in the order they are tried.
   */
  get roots(): Resource[] {
    return this.resolvers.map((resolver) => resolver.root);
  }

  /**
   * Resolve a path against each root in turn.
   *
   * @param path - Segment list, or a URL path that is split and decoded
   * @param values - Named values from the query string and form body
   * @returns The value of the first root that resolved
   * @throws NotFoundError if every root answered NotFound; `attempts` holds
   * one entry per root
   * @throws MethodNotAllowedError if a root reached a method-keyed resource
   * that does not answer `options.method`
   */
  async resolve(
    path: string | readonly string[],
    values?: ValueSource,
    options: SiteResolveOptions = {}
  ): Promise<unknown> {
    const segments = typeof path === 'string' ? splitPath(path) : path;
    const bag = toValueBag(values);
    const resolutionId = randomUUID();
    const startTime = Date.now();
    const attempts: RootAttempt[] = [];
    const trace: TraceEntry[] = [];

    this.events.emitStarted(resolutionId, segments);

    for (const resolver of this.resolvers) {
      const root = resolver.root.name;
      try {
        const value = await resolver.resolve(segments, bag, options);
        this.events.emitSucceeded(resolutionId, root, Date.now() - startTime);
        return value;
      } catch (error) {
        if (error instanceof NotFoundError) {
          attempts.push({ root, reason: error.reason });
          trace.push(...error.trace);
          log.debug('Root did not match, trying next', {
            site: this.config.name,
            resolution_id: resolutionId,
            root,
            reason: error.reason,
          });
          this.events.emitRootMissed(resolutionId, root, error.reason);
          continue;
        }

        if (!(error instanceof PathRewrite)) {
          this.events.emitFailed(resolutionId, root, error, Date.now() - startTime);
        }
        throw error;
      }
    }

    this.events.emitNotFound(resolutionId, segments, Date.now() - startTime);
    throw new NotFoundError('no root matched', { attempts, trace });
  }

  /**
   * Resolve a request and classify the outcome.
   *
   * Follows {@link PathRewrite} signals thrown by pages, keeping the
   * request's values, up to `maxRewrites` times. Never throws.
   */
  async dispatch(
    input: RouteRequest | DispatchInput | string,
    options: SiteResolveOptions = {}
  ): Promise<DispatchOutcome> {
    let request: RouteRequest;
    try {
      request = toRouteRequest(input, options.method);
    } catch (error) {
      return this.classify(error, []);
    }

    let segments = request.segments;
    let rewrites = 0;
    const resolveOptions: SiteResolveOptions =
      request.method === undefined ? options : { ...options, method: request.method };

    for (;;) {
      try {
        const value = await this.resolve(segments, request.values, resolveOptions);
        return { kind: OutcomeKind.FOUND, value, segments, rewrites };
      } catch (error) {
        if (!(error instanceof PathRewrite)) {
          return this.classify(error, segments);
        }

        if (rewrites >= this.config.maxRewrites) {
          return this.classify(new RewriteLimitError(this.config.maxRewrites, { cause: error }), segments);
        }

        rewrites++;
        log.debug('Following path rewrite', {
          site: this.config.name,
          from: segments.join('/'),
          to: error.segments.join('/'),
          rewrites,
        });
        this.events.emitRewritten(segments, error.segments, rewrites);
        segments = error.segments;
      }
    }
  }

  private classify(error: unknown, segments: readonly string[]): DispatchOutcome {
    if (error instanceof NotFoundError) {
      return { kind: OutcomeKind.NOT_FOUND, error };
    }

    if (error instanceof MethodNotAllowedError) {
      log.debug('Method not allowed', {
        site: this.config.name,
        path: segments.join('/'),
        method: error.method,
        allowed: error.allowed.join(','),
      });
      return { kind: OutcomeKind.METHOD_NOT_ALLOWED, error };
    }

    log.error('Application error during dispatch', {
      site: this.config.name,
      path: segments.join('/'),
      error_name: error instanceof Error ? error.name : typeof error,
      error_message: errorMessage(error),
    });
    return { kind: OutcomeKind.APPLICATION_ERROR, error };
  }
}
