/**
 * Method selector.
 *
 * Decides what a single segment (or its absence) addresses on a resource.
 * Page, child and locator selections consume the segment; the default
 * handler receives it as its first positional value instead. A
 * method-keyed resource ignores the segment and selects by request method.
 */

import type { Resource } from '../resource/resource.js';
import { DEFAULT_METHOD } from './context.js';
import type { DefaultDefinition, LocatorDefinition, PageDefinition } from '../resource/types.js';

export type Selection =
  | { kind: 'page'; definition: PageDefinition }
  | { kind: 'child'; resource: Resource }
  | { kind: 'locator'; definition: LocatorDefinition }
  | { kind: 'index'; definition: PageDefinition }
  | { kind: 'default'; definition: DefaultDefinition }
  | { kind: 'method'; definition: PageDefinition }
  | { kind: 'method_not_allowed'; allowed: string[] }
  | { kind: 'none'; reason: string };

/**
 * Select the member a segment addresses.
 *
 * @param resource - Current resource
 * @param segment - Next path segment, or null when the path is exhausted
 * @param method - Upper-case request method
 */
export function selectMember(resource: Resource, segment: string | null, method: string = DEFAULT_METHOD): Selection {
  if (resource.methodKeyed) {
    const definition = resource.method(method);
    if (definition) {
      return { kind: 'method', definition };
    }
    return { kind: 'method_not_allowed', allowed: resource.allowedMethods() };
  }

  if (segment === null) {
    if (resource.index) {
      return { kind: 'index', definition: resource.index };
    }
    return { kind: 'none', reason: `'${resource.name}' has no index` };
  }

  const member = resource.member(segment);
  if (member) {
    switch (member.kind) {
      case 'page':
        return { kind: 'page', definition: member };
      case 'child':
        return { kind: 'child', resource: member.resource };
      case 'locator':
        return { kind: 'locator', definition: member };
    }
  }

  if (resource.fallback) {
    return { kind: 'default', definition: resource.fallback };
  }

  return { kind: 'none', reason: `'${resource.name}' has no member '${segment}'` };
}
