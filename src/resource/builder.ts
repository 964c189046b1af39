/**
 * Fluent builder for resources.
 *
 * @example
 * ```typescript
 * const root = new ResourceBuilder('root')
 *   .index([], () => 'index')
 *   .page('hello', [positional('name')], ({ name }) => `Hello ${name}!`)
 *   .child('news', news)
 *   .locator('forum', [positional('id', { coerce: int })], ({ id }) => new ForumResource(id))
 *   .build();
 * ```
 */

import type { ParamList } from '../params/descriptor.js';
import { child, defaultHandler, defaultLocator, indexPage, locator, methodPage, page } from './definitions.js';
import { ResourceDefinitionError } from './errors.js';
import { Resource } from './resource.js';
import type {
  DefaultBody,
  DefaultDefinition,
  LocatorBody,
  MemberDefinition,
  PageBody,
  PageDefinition,
  PageOptions,
} from './types.js';

/**
 * Collects member definitions and builds a validated {@link Resource}.
 *
 * Validation (duplicate names, reserved names, parameter lists) happens in
 * {@link build}, through the Resource constructor.
 */
export class ResourceBuilder {
  readonly name: string;

  private readonly members: MemberDefinition[] = [];
  private readonly methods: PageDefinition[] = [];
  private indexDefinition: PageDefinition | null = null;
  private defaultDefinition: DefaultDefinition | null = null;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Register a page.
   */
  page<P extends ParamList, R>(
    name: string,
    params: P,
    body: PageBody<P, R>,
    options?: PageOptions
  ): this {
    this.members.push(page(name, params, body, options));
    return this;
  }

  /**
   * Mount a child resource.
   */
  child(name: string, resource: Resource): this {
    this.members.push(child(name, resource));
    return this;
  }

  /**
   * Register a locator.
   */
  locator<P extends ParamList>(name: string, params: P, body: LocatorBody<P>): this {
    this.members.push(locator(name, params, body));
    return this;
  }

  /**
   * Set the index page.
   *
   * @throws ResourceDefinitionError if an index was already set
   */
  index<P extends ParamList, R>(params: P, body: PageBody<P, R>, options?: PageOptions): this {
    if (this.indexDefinition) {
      throw new ResourceDefinitionError(this.name, 'index defined twice');
    }
    this.indexDefinition = indexPage(params, body, options);
    return this;
  }

  /**
   * Register a page for a request method.
   */
  method<P extends ParamList, R>(verb: string, params: P, body: PageBody<P, R>, options?: PageOptions): this {
    this.methods.push(methodPage(verb, params, body, options));
    return this;
  }

  /**
   * Set a terminal default handler.
   *
   * @throws ResourceDefinitionError if a default was already set
   */
  default<P extends ParamList, R>(params: P, body: DefaultBody<P, R>): this {
    this.setDefault(defaultHandler(params, body));
    return this;
  }

  /**
   * Set a default handler that returns the resource to continue in.
   *
   * @throws ResourceDefinitionError if a default was already set
   */
  defaultLocator<P extends ParamList>(params: P, body: LocatorBody<P>): this {
    this.setDefault(defaultLocator(params, body));
    return this;
  }

  private setDefault(definition: DefaultDefinition): void {
    if (this.defaultDefinition) {
      throw new ResourceDefinitionError(this.name, 'default defined twice');
    }
    this.defaultDefinition = definition;
  }

  /**
   * Build the resource.
   *
   * @throws ResourceDefinitionError if the collected definition is malformed
   */
  build(): Resource {
    return new Resource({
      name: this.name,
      members: [...this.members],
      index: this.indexDefinition,
      default: this.defaultDefinition,
      methods: [...this.methods],
    });
  }
}

/**
 * Build a resource with a builder callback.
 *
 * @example
 * ```typescript
 * const news = defineResource('news', (r) => r.index([], () => 'all_news'));
 * ```
 */
export function defineResource(
  name: string,
  configure: (builder: ResourceBuilder) => ResourceBuilder | void
): Resource {
  const builder = new ResourceBuilder(name);
  configure(builder);
  return builder.build();
}
