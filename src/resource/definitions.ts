/**
 * Factory functions for member definitions.
 *
 * @example
 * ```typescript
 * const forum = new Resource({
 *   name: 'forum',
 *   index: indexPage([], () => 'topics'),
 *   members: [
 *     page('topic', [positional('topic', { coerce: int })], ({ topic }) => `topic ${topic}`),
 *   ],
 * });
 * ```
 */

import type { BoundArgs, ParamList } from '../params/descriptor.js';
import type { Resource } from './resource.js';
import type {
  ChildDefinition,
  DefaultBody,
  DefaultDefinition,
  ErasedBody,
  LocatorBody,
  LocatorDefinition,
  PageBody,
  PageContext,
  PageDefinition,
  PageOptions,
} from './types.js';

/**
 * Drop the argument typing of a body so that definitions can live in one
 * name → member map.
 */
function erase<P extends ParamList, R>(
  body: (args: BoundArgs<P>, context: PageContext) => R | Promise<R>
): ErasedBody<R> {
  // Arguments are always produced by bindArguments over this same parameter
  // list, so every declared name is present with its coerced type.
  return (args, context) => body(args as BoundArgs<P>, context);
}

/**
 * Define a page: a terminal handler selected by name.
 *
 * Path segments after the page name are bound to its positional
 * parameters; a surplus segment makes the page unreachable.
 */
export function page<P extends ParamList, R>(
  name: string,
  params: P,
  body: PageBody<P, R>,
  options: PageOptions = {}
): PageDefinition {
  return {
    kind: 'page',
    name,
    params,
    preprocessors: options.preprocessors ?? [],
    postprocessors: options.postprocessors ?? [],
    run: erase(body),
  };
}

/**
 * Define the index page, selected when no segments remain.
 *
 * The index never receives path segments; positional parameters can only be
 * filled by name.
 */
export function indexPage<P extends ParamList, R>(
  params: P,
  body: PageBody<P, R>,
  options: PageOptions = {}
): PageDefinition {
  return page('index', params, body, options);
}

/**
 * Mount a child resource under a name.
 */
export function child(name: string, resource: Resource): ChildDefinition {
  return { kind: 'child', name, resource };
}

/**
 * Define a locator: a named handler that binds as many path segments as it
 * has positional parameters and returns the resource to continue in.
 *
 * @example
 * ```typescript
 * locator('forum', [positional('id', { coerce: int })], ({ id }) => new ForumResource(id));
 * // /forum/10/topic/3 → ForumResource(10), then 'topic/3' inside it
 * ```
 */
export function locator<P extends ParamList>(
  name: string,
  params: P,
  body: LocatorBody<P>
): LocatorDefinition {
  return { kind: 'locator', name, params, run: erase(body) };
}

/**
 * Define a terminal default handler, selected for an unmatched segment.
 *
 * The unmatched segment and everything after it are bound like the path
 * remainder of a page: the first segment goes to the first positional
 * parameter, so at least one positional or rest parameter is required. A
 * surplus segment fails binding before the body runs.
 */
export function defaultHandler<P extends ParamList, R>(
  params: P,
  body: DefaultBody<P, R>
): DefaultDefinition {
  return { kind: 'default', params, descends: false, run: erase(body) };
}

/**
 * Define a default handler that locates a resource for the unmatched
 * segment, the way {@link locator} does for a named one.
 *
 * @example
 * ```typescript
 * defaultLocator([positional('chapter')], ({ chapter }) => new ChapterResource(chapter));
 * // /docs/intro/page/2 → ChapterResource('intro'), then 'page/2' inside it
 * ```
 */
export function defaultLocator<P extends ParamList>(params: P, body: LocatorBody<P>): DefaultDefinition {
  return { kind: 'default', params, descends: true, run: erase(body) };
}

/**
 * Define a page selected by request method on a method-keyed resource.
 *
 * The verb is matched case-insensitively. Every remaining path segment is
 * bound to the page's parameters.
 *
 * @example
 * ```typescript
 * new Resource({
 *   name: 'hello',
 *   methods: [
 *     methodPage('GET', [], () => 'hello'),
 *     methodPage('PUT', [positional('data')], ({ data }) => `stored ${data}`),
 *   ],
 * });
 * ```
 */
export function methodPage<P extends ParamList, R>(
  verb: string,
  params: P,
  body: PageBody<P, R>,
  options: PageOptions = {}
): PageDefinition {
  return page(verb.toUpperCase(), params, body, options);
}
