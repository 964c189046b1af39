/**
 * Resource module.
 *
 * The traversal tree and the authoring API used to build it.
 */

export { defineResource, ResourceBuilder } from './builder.js';
export { child, defaultHandler, defaultLocator, indexPage, locator, methodPage, page } from './definitions.js';
export { ResourceDefinitionError } from './errors.js';
export { RESERVED_NAMES, Resource } from './resource.js';
export type {
  ChildDefinition,
  DefaultBody,
  DefaultDefinition,
  ErasedBody,
  InvocableDefinition,
  LocatorBody,
  LocatorDefinition,
  MemberDefinition,
  PageBody,
  PageContext,
  PageDefinition,
  PageOptions,
  Postprocessor,
  Preprocessor,
  ResourceDefinition,
} from './types.js';
