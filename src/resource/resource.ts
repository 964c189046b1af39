/**
 * Resource: a node of the traversal tree.
 *
 * The name → member map is built and validated once, in the constructor,
 * and is read-only afterwards. Resolution only ever reads it, so a tree can
 * be shared by any number of concurrent resolutions.
 *
 * @example
 * ```typescript
 * class ForumResource extends Resource {
 *   constructor(readonly forumId: number) {
 *     super({
 *       name: `forum(${forumId})`,
 *       index: indexPage([], () => `forum(${forumId}).index`),
 *       members: [
 *         page('topic', [positional('topic', { coerce: int })], ({ topic }) => topic),
 *       ],
 *     });
 *   }
 * }
 * ```
 */

import { type ParamList, takesSegments } from '../params/descriptor.js';
import { ResourceDefinitionError } from './errors.js';
import type {
  DefaultDefinition,
  MemberDefinition,
  PageDefinition,
  ResourceDefinition,
} from './types.js';

/**
 * Names that address slots rather than members.
 */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(['index', 'default']);

const PARAM_KINDS: ReadonlySet<string> = new Set(['positional', 'keyword', 'rest', 'capture']);

function checkParams(resourceName: string, owner: string, params: ParamList): void {
  const seen = new Set<string>();
  let restName: string | null = null;
  let captureName: string | null = null;

  for (const { name, kind } of params) {
    if (!PARAM_KINDS.has(kind)) {
      throw new ResourceDefinitionError(resourceName, `parameter '${name}' of '${owner}' has unknown kind`);
    }
    if (seen.has(name)) {
      throw new ResourceDefinitionError(resourceName, `parameter '${name}' declared twice on '${owner}'`);
    }
    seen.add(name);

    if (kind === 'positional' && restName !== null) {
      throw new ResourceDefinitionError(
        resourceName,
        `positional parameter '${name}' of '${owner}' follows rest parameter '${restName}'`
      );
    }
    if (kind === 'rest') {
      if (restName !== null) {
        throw new ResourceDefinitionError(resourceName, `'${owner}' declares more than one rest parameter`);
      }
      restName = name;
    }
    if (kind === 'capture') {
      if (captureName !== null) {
        throw new ResourceDefinitionError(resourceName, `'${owner}' declares more than one capture parameter`);
      }
      captureName = name;
    }
  }
}

function checkMemberName(resourceName: string, name: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new ResourceDefinitionError(resourceName, 'member names must be non-empty strings');
  }
  if (name.includes('/')) {
    throw new ResourceDefinitionError(resourceName, `member name '${name}' contains '/'`);
  }
  if (RESERVED_NAMES.has(name)) {
    throw new ResourceDefinitionError(
      resourceName,
      `'${name}' is reserved; use the ${name} slot instead`
    );
  }
}

function buildMemberMap(
  resourceName: string,
  members: readonly MemberDefinition[]
): ReadonlyMap<string, MemberDefinition> {
  const map = new Map<string, MemberDefinition>();

  for (const member of members) {
    checkMemberName(resourceName, member.name);

    const existing = map.get(member.name);
    if (existing) {
      throw new ResourceDefinitionError(
        resourceName,
        `duplicate member '${member.name}' (${existing.kind} and ${member.kind})`
      );
    }

    switch (member.kind) {
      case 'page':
      case 'locator':
        checkParams(resourceName, member.name, member.params);
        break;
      case 'child':
        if (!(member.resource instanceof Resource)) {
          throw new ResourceDefinitionError(
            resourceName,
            `child '${member.name}' is not a Resource`
          );
        }
        break;
      default: {
        const unknownMember: never = member;
        throw new ResourceDefinitionError(
          resourceName,
          `member ${String(unknownMember)} has unknown kind`
        );
      }
    }

    map.set(member.name, member);
  }

  return map;
}

function checkIndex(resourceName: string, index: PageDefinition | null): void {
  if (!index) {
    return;
  }
  if (index.kind !== 'page') {
    throw new ResourceDefinitionError(resourceName, 'index must be a page');
  }
  checkParams(resourceName, 'index', index.params);
}

function checkDefault(resourceName: string, fallback: DefaultDefinition | null): void {
  if (!fallback) {
    return;
  }
  if (fallback.kind !== 'default') {
    throw new ResourceDefinitionError(resourceName, 'default must be a default handler');
  }
  checkParams(resourceName, 'default', fallback.params);
  if (!takesSegments(fallback.params)) {
    throw new ResourceDefinitionError(
      resourceName,
      'default needs a positional or rest parameter for the unmatched segment'
    );
  }
}

function buildMethodMap(
  resourceName: string,
  definition: ResourceDefinition
): ReadonlyMap<string, PageDefinition> {
  const map = new Map<string, PageDefinition>();
  const methods = definition.methods ?? [];
  if (methods.length === 0) {
    return map;
  }

  if ((definition.members ?? []).length > 0 || definition.index || definition.default) {
    throw new ResourceDefinitionError(
      resourceName,
      'a method-keyed resource cannot also have members, an index or a default'
    );
  }

  for (const method of methods) {
    const { kind, name } = method;
    if (kind !== 'page') {
      throw new ResourceDefinitionError(resourceName, `method '${name}' must be a page`);
    }
    if (!/^[A-Za-z]+$/.test(name)) {
      throw new ResourceDefinitionError(resourceName, `method name '${name}' is not a verb`);
    }
    const verb = name.toUpperCase();
    if (map.has(verb)) {
      throw new ResourceDefinitionError(resourceName, `method '${verb}' defined twice`);
    }
    checkParams(resourceName, verb, method.params);
    map.set(verb, method);
  }

  return map;
}

/**
 * A node in the traversal tree.
 */
export class Resource {
  /** Diagnostic name */
  readonly name: string;

  /** Page selected when no segments remain */
  readonly index: PageDefinition | null;

  /** Handler selected for an unmatched segment */
  readonly fallback: DefaultDefinition | null;

  private readonly members: ReadonlyMap<string, MemberDefinition>;
  private readonly methods: ReadonlyMap<string, PageDefinition>;

  /**
   * Build and validate a resource.
   *
   * @throws ResourceDefinitionError if the definition is malformed
   */
  constructor(definition: ResourceDefinition) {
    if (typeof definition.name !== 'string' || definition.name.length === 0) {
      throw new ResourceDefinitionError('<anonymous>', 'resource name must be a non-empty string');
    }

    this.name = definition.name;
    this.members = buildMemberMap(definition.name, definition.members ?? []);
    this.index = definition.index ?? null;
    this.fallback = definition.default ?? null;
    this.methods = buildMethodMap(definition.name, definition);

    checkIndex(this.name, this.index);
    checkDefault(this.name, this.fallback);
  }

  /**
   * Check if the resource dispatches on the request method instead of a
   * path segment.
   */
  get methodKeyed(): boolean {
    return this.methods.size > 0;
  }

  /**
   * Look up the page for a request method, case-insensitively.
   */
  method(verb: string): PageDefinition | undefined {
    return this.methods.get(verb.toUpperCase());
  }

  /**
   * List the upper-case methods a method-keyed resource answers, in
   * registration order.
   */
  allowedMethods(): string[] {
    return [...this.methods.keys()];
  }

  /**
   * Look up a member by exact, case-sensitive name.
   */
  member(name: string): MemberDefinition | undefined {
    return this.members.get(name);
  }

  /**
   * Check if a member is registered under this name.
   */
  has(name: string): boolean {
    return this.members.has(name);
  }

  /**
   * List member names in registration order.
   */
  memberNames(): string[] {
    return [...this.members.keys()];
  }

  toString(): string {
    return `Resource(${this.name})`;
  }
}
