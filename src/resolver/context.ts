/**
 * Per-request resolution context.
 *
 * Created fresh for every resolution and discarded afterwards; nothing in
 * here is shared between requests.
 */

import type { ValueBag } from '../params/value-bag.js';
import type { Resource } from '../resource/resource.js';

/**
 * Kind of step recorded in a trace.
 */
export type TraceStep =
  | 'page'
  | 'index'
  | 'child'
  | 'locator'
  | 'default'
  | 'method'
  | 'redescend'
  | 'miss'
  | 'bind_failed';

/**
 * One step of a resolution, for diagnostics.
 */
export interface TraceEntry {
  step: TraceStep;
  /** Name of the resource the step happened in */
  resource: string;
  /** Segment under consideration, null when the path was exhausted */
  segment: string | null;
  /** Failure reason for misses and binding failures */
  detail: string | null;
}

export interface ResolutionContext {
  readonly path: readonly string[];
  readonly values: ValueBag;
  /** Upper-case request method */
  readonly method: string;
  readonly signal: AbortSignal | undefined;
  /** Resources entered so far, root first */
  readonly trail: Resource[];
  readonly trace: TraceEntry[];
}

/** Method assumed when the caller names none */
export const DEFAULT_METHOD = 'GET';

/**
 * Start a resolution. The path and values are copied, so later changes to
 * the caller's collections do not reach the handlers.
 */
export function createResolutionContext(
  path: readonly string[],
  values: ValueBag,
  signal?: AbortSignal,
  method: string = DEFAULT_METHOD
): ResolutionContext {
  return {
    path: [...path],
    values: new Map(values),
    method: method.toUpperCase(),
    signal,
    trail: [],
    trace: [],
  };
}

/**
 * Append a step to the context trace.
 */
export function record(
  context: ResolutionContext,
  step: TraceStep,
  resource: Resource,
  segment: string | null,
  detail: string | null = null
): void {
  context.trace.push({ step, resource: resource.name, segment, detail });
}
