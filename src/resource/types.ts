/**
 * Member definitions for resources.
 *
 * A resource exposes members by name: pages (terminal handlers), child
 * resources mounted statically, and locators (handlers that bind some path
 * segments and hand back the resource to continue in). Two more slots sit
 * outside the name map: `index`, selected when the path is exhausted, and
 * `default`, selected for a segment nothing else matches.
 *
 * A resource may instead be keyed by request method: its `methods` are
 * pages named after verbs, selected by the method of the request rather
 * than by a path segment.
 *
 * These are plain read-only records. Build them with the factory functions
 * in `definitions.ts` or with {@link ResourceBuilder}.
 */

import type { BoundArgs, ParamList } from '../params/descriptor.js';
import type { ValueBag } from '../params/value-bag.js';
import type { Resource } from './resource.js';

/**
 * What a handler body sees besides its bound arguments.
 */
export interface PageContext {
  /** Every segment of the path being resolved */
  readonly path: readonly string[];
  /** Segments consumed before this handler was selected */
  readonly consumed: readonly string[];
  /** Named values of the request */
  readonly values: ValueBag;
  /** Upper-case request method */
  readonly method: string;
  /** Resource that owns the handler */
  readonly resource: Resource;
  /** Resources traversed from the root, root first */
  readonly trail: readonly Resource[];
  /** Cancellation signal of the request, if the caller supplied one */
  readonly signal: AbortSignal | undefined;
}

/** Body of a page with typed arguments */
export type PageBody<P extends ParamList, R> = (args: BoundArgs<P>, context: PageContext) => R | Promise<R>;

/** Body of a locator; must produce the resource to descend into */
export type LocatorBody<P extends ParamList> = (
  args: BoundArgs<P>,
  context: PageContext
) => Resource | Promise<Resource>;

/** Body of a terminal default handler */
export type DefaultBody<P extends ParamList, R> = PageBody<P, R>;

/** Type-erased body as stored in a definition */
export type ErasedBody<R> = (args: Record<string, unknown>, context: PageContext) => R | Promise<R>;

/**
 * Runs before a page body. Returning anything other than `undefined`
 * short-circuits the body and becomes the page result.
 */
export type Preprocessor = (args: Readonly<Record<string, unknown>>, context: PageContext) => unknown;

/**
 * Transforms a page result. Postprocessors run in declaration order, also on
 * results produced by a preprocessor.
 */
export type Postprocessor = (value: unknown, context: PageContext) => unknown;

export interface PageOptions {
  preprocessors?: readonly Preprocessor[];
  postprocessors?: readonly Postprocessor[];
}

export interface PageDefinition {
  readonly kind: 'page';
  readonly name: string;
  readonly params: ParamList;
  readonly preprocessors: readonly Preprocessor[];
  readonly postprocessors: readonly Postprocessor[];
  readonly run: ErasedBody<unknown>;
}

export interface ChildDefinition {
  readonly kind: 'child';
  readonly name: string;
  readonly resource: Resource;
}

export interface LocatorDefinition {
  readonly kind: 'locator';
  readonly name: string;
  readonly params: ParamList;
  readonly run: ErasedBody<Resource>;
}

export interface DefaultDefinition {
  readonly kind: 'default';
  readonly params: ParamList;
  /**
   * When set, the handler binds only the segments its parameters take and
   * must return the resource that resolves the rest. Otherwise it is
   * terminal and binds every remaining segment.
   */
  readonly descends: boolean;
  readonly run: ErasedBody<unknown>;
}

/** Anything that can be registered under a name */
export type MemberDefinition = PageDefinition | ChildDefinition | LocatorDefinition;

/** Handlers that are invoked with bound arguments */
export type InvocableDefinition = PageDefinition | LocatorDefinition | DefaultDefinition;

/**
 * Declarative description of a resource.
 */
export interface ResourceDefinition {
  /** Diagnostic name, used in logs and traces */
  readonly name: string;
  readonly members?: readonly MemberDefinition[];
  readonly index?: PageDefinition | null;
  readonly default?: DefaultDefinition | null;
  /** Pages keyed by upper-case request method; excludes every other slot */
  readonly methods?: readonly PageDefinition[];
}
