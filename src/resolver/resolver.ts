/**
 * Resolver: walks a path through a resource tree.
 *
 * The walk is a small state machine. {@link transition} moves between the
 * synchronous states; the only asynchronous step is invoking a handler,
 * which the {@link Resolver.resolve} driver awaits before feeding the value
 * back through {@link afterInvocation}.
 *
 *   descending ──page/index/method/locator/default──▶ invoking
 *   descending ──child──▶ descending
 *   descending ──unknown method──▶ rejected (MethodNotAllowed)
 *   invoking ──value──▶ succeeded
 *   invoking ──Resource (locator/default locator)──▶ redescending ──▶ descending
 *   any miss or binding failure ──▶ failed (NotFound)
 *
 * Errors thrown by handler bodies are not caught here.
 */

import { bindArguments } from '../params/binder.js';
import type { ValueBag } from '../params/value-bag.js';
import { EMPTY_VALUES } from '../params/value-bag.js';
import { createLogger } from '../logging/index.js';
import { Resource } from '../resource/resource.js';
import type {
  DefaultDefinition,
  LocatorDefinition,
  PageContext,
  PageDefinition,
} from '../resource/types.js';
import { createResolutionContext, type ResolutionContext, record } from './context.js';
import {
  LocatorResultError,
  MethodNotAllowedError,
  NotFoundError,
  ResolutionAbortedError,
} from './errors.js';
import { selectMember } from './method-selector.js';

const log = createLogger({ component: 'resolver' });

/**
 * A handler selected for invocation, with its bound arguments.
 */
export type Invocation =
  | { role: 'page' | 'index' | 'method'; definition: PageDefinition; args: Record<string, unknown> }
  | { role: 'locator'; definition: LocatorDefinition; args: Record<string, unknown> }
  | { role: 'default'; definition: DefaultDefinition; args: Record<string, unknown> };

export interface DescendingState {
  kind: 'descending';
  resource: Resource;
  remaining: readonly string[];
}

export interface RedescendingState {
  kind: 'redescending';
  resource: Resource;
  remaining: readonly string[];
}

export interface InvokingState {
  kind: 'invoking';
  resource: Resource;
  invocation: Invocation;
  /** Number of path segments consumed up to and including the handler name */
  consumedCount: number;
  /** Segments left after binding, for locators and defaults */
  remaining: readonly string[];
}

export interface SucceededState {
  kind: 'succeeded';
  value: unknown;
}

export interface FailedState {
  kind: 'failed';
  reason: string;
}

export interface RejectedState {
  kind: 'rejected';
  method: string;
  allowed: readonly string[];
}

export type ResolverState =
  | DescendingState
  | RedescendingState
  | InvokingState
  | SucceededState
  | FailedState
  | RejectedState;

/** States that {@link transition} advances without suspending */
export type SteppableState = DescendingState | RedescendingState;

function failed(reason: string): FailedState {
  return { kind: 'failed', reason };
}

/**
 * Advance a descending or redescending state by one step.
 */
export function transition(state: SteppableState, context: ResolutionContext): ResolverState {
  if (state.kind === 'redescending') {
    record(context, 'redescend', state.resource, state.remaining[0] ?? null);
    return { kind: 'descending', resource: state.resource, remaining: state.remaining };
  }

  const { resource, remaining } = state;
  context.trail.push(resource);

  const segment = remaining.length > 0 ? remaining[0] : null;
  const rest = remaining.slice(1);
  const consumedBefore = context.path.length - remaining.length;
  const selection = selectMember(resource, segment, context.method);

  switch (selection.kind) {
    case 'none': {
      record(context, 'miss', resource, segment, selection.reason);
      log.debug('Segment not matched', { resource: resource.name, segment, reason: selection.reason });
      return failed(selection.reason);
    }

    case 'method_not_allowed': {
      const reason = `'${resource.name}' does not answer ${context.method}`;
      record(context, 'miss', resource, segment, reason);
      log.debug('Method not allowed', { resource: resource.name, method: context.method });
      return { kind: 'rejected', method: context.method, allowed: selection.allowed };
    }

    case 'method': {
      const bound = bindArguments(selection.definition.params, remaining, context.values);
      if (!bound.ok) {
        record(context, 'bind_failed', resource, segment, bound.reason);
        log.debug('Arguments not bound', { resource: resource.name, step: 'method', reason: bound.reason });
        return failed(bound.reason);
      }
      record(context, 'method', resource, segment);
      return {
        kind: 'invoking',
        resource,
        invocation: { role: 'method', definition: selection.definition, args: bound.args },
        consumedCount: consumedBefore,
        remaining: [],
      };
    }

    case 'child': {
      record(context, 'child', resource, segment);
      return { kind: 'descending', resource: selection.resource, remaining: rest };
    }

    case 'index':
    case 'page': {
      const step = selection.kind;
      const bound = bindArguments(selection.definition.params, rest, context.values);
      if (!bound.ok) {
        record(context, 'bind_failed', resource, segment, bound.reason);
        log.debug('Arguments not bound', { resource: resource.name, step, reason: bound.reason });
        return failed(bound.reason);
      }
      record(context, step, resource, segment);
      return {
        kind: 'invoking',
        resource,
        invocation: { role: step, definition: selection.definition, args: bound.args },
        consumedCount: step === 'index' ? consumedBefore : consumedBefore + 1,
        remaining: [],
      };
    }

    case 'locator': {
      const bound = bindArguments(selection.definition.params, rest, context.values, {
        partial: true,
      });
      if (!bound.ok) {
        record(context, 'bind_failed', resource, segment, bound.reason);
        log.debug('Arguments not bound', { resource: resource.name, step: 'locator', reason: bound.reason });
        return failed(bound.reason);
      }
      record(context, 'locator', resource, segment);
      return {
        kind: 'invoking',
        resource,
        invocation: { role: 'locator', definition: selection.definition, args: bound.args },
        consumedCount: consumedBefore + 1,
        remaining: rest.slice(bound.consumed),
      };
    }

    case 'default': {
      const { descends } = selection.definition;
      const bound = bindArguments(selection.definition.params, remaining, context.values, {
        partial: descends,
      });
      if (!bound.ok) {
        record(context, 'bind_failed', resource, segment, bound.reason);
        log.debug('Arguments not bound', { resource: resource.name, step: 'default', reason: bound.reason });
        return failed(bound.reason);
      }
      record(context, 'default', resource, segment);
      return {
        kind: 'invoking',
        resource,
        invocation: { role: 'default', definition: selection.definition, args: bound.args },
        consumedCount: consumedBefore,
        remaining: descends ? remaining.slice(bound.consumed) : [],
      };
    }
  }
}

/**
 * Fold the value produced by an invocation back into the state machine.
 *
 * @throws LocatorResultError if a locator or default locator produced
 * something other than a Resource
 */
export function afterInvocation(state: InvokingState, value: unknown): ResolverState {
  const { invocation, remaining, resource } = state;

  switch (invocation.role) {
    case 'page':
    case 'index':
    case 'method':
      return { kind: 'succeeded', value };

    case 'locator':
      if (!(value instanceof Resource)) {
        throw new LocatorResultError(resource.name, invocation.definition.name);
      }
      return { kind: 'redescending', resource: value, remaining };

    case 'default':
      if (!invocation.definition.descends) {
        return { kind: 'succeeded', value };
      }
      if (!(value instanceof Resource)) {
        throw new LocatorResultError(resource.name, 'default');
      }
      return { kind: 'redescending', resource: value, remaining };
  }
}

function pageContext(state: InvokingState, context: ResolutionContext): PageContext {
  return {
    path: context.path,
    consumed: context.path.slice(0, state.consumedCount),
    values: context.values,
    method: context.method,
    resource: state.resource,
    trail: [...context.trail],
    signal: context.signal,
  };
}

async function runPage(
  definition: PageDefinition,
  args: Record<string, unknown>,
  pageCtx: PageContext
): Promise<unknown> {
  let value: unknown;
  let shortCircuited = false;

  for (const preprocessor of definition.preprocessors) {
    const early = await preprocessor(args, pageCtx);
    if (early !== undefined) {
      value = early;
      shortCircuited = true;
      break;
    }
  }

  if (!shortCircuited) {
    value = await definition.run(args, pageCtx);
  }

  for (const postprocessor of definition.postprocessors) {
    value = await postprocessor(value, pageCtx);
  }

  return value;
}

/**
 * Invoke the handler of an invoking state. This is the single suspension
 * point of a resolution.
 */
export async function invoke(state: InvokingState, context: ResolutionContext): Promise<unknown> {
  if (context.signal?.aborted) {
    throw new ResolutionAbortedError(context.signal.reason);
  }

  const pageCtx = pageContext(state, context);
  const { invocation } = state;

  switch (invocation.role) {
    case 'page':
    case 'index':
    case 'method':
      return runPage(invocation.definition, invocation.args, pageCtx);
    case 'locator':
    case 'default':
      return invocation.definition.run(invocation.args, pageCtx);
  }
}

export interface ResolveOptions {
  /** Aborts the resolution before the next handler invocation */
  signal?: AbortSignal;
  /** Request method, matched case-insensitively; defaults to GET */
  method?: string;
}

/**
 * Resolve a segment list against a root resource.
 *
 * @returns The value produced by the selected handler
 * @throws NotFoundError if nothing matched or arguments could not be bound
 * @throws MethodNotAllowedError if a method-keyed resource does not answer
 * the request method
 * @throws ResolutionAbortedError if the signal fired before an invocation
 */
export async function resolveResource(
  root: Resource,
  segments: readonly string[],
  values: ValueBag = EMPTY_VALUES,
  options: ResolveOptions = {}
): Promise<unknown> {
  const context = createResolutionContext(segments, values, options.signal, options.method);
  let state: ResolverState = { kind: 'descending', resource: root, remaining: segments };

  for (;;) {
    switch (state.kind) {
      case 'succeeded':
        return state.value;
      case 'failed':
        throw new NotFoundError(state.reason, { trace: context.trace });
      case 'rejected':
        throw new MethodNotAllowedError(state.method, state.allowed, context.trace);
      case 'invoking': {
        const value = await invoke(state, context);
        state = afterInvocation(state, value);
        break;
      }
      default:
        state = transition(state, context);
    }
  }
}

/**
 * Resolver bound to one root resource.
 *
 * @example
 * ```typescript
 * const resolver = new Resolver(root);
 * const value = await resolver.resolve(['forum', '10', 'topic', '3'], new Map([['offset', '20']]));
 * ```
 */
export class Resolver {
  readonly root: Resource;

  constructor(root: Resource) {
    this.root = root;
  }

  resolve(
    segments: readonly string[],
    values: ValueBag = EMPTY_VALUES,
    options: ResolveOptions = {}
  ): Promise<unknown> {
    return resolveResource(this.root, segments, values, options);
  }
}
