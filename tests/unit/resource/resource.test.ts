/**
 * Resource construction and validation tests.
 */

import { describe, expect, it } from 'vitest';
import { capture, keyword, positional, rest } from '../../../src/params/descriptor.js';
import {
  child,
  defaultHandler,
  defaultLocator,
  indexPage,
  locator,
  methodPage,
  page,
} from '../../../src/resource/definitions.js';
import { ResourceDefinitionError } from '../../../src/resource/errors.js';
import { Resource } from '../../../src/resource/resource.js';
import type { ChildDefinition } from '../../../src/resource/types.js';

const leaf = new Resource({ name: 'leaf', index: indexPage([], () => 'leaf') });

describe('Resource', () => {
  describe('members', () => {
    it('looks members up by exact name', () => {
      const resource = new Resource({
        name: 'root',
        members: [page('hello', [positional('name')], ({ name }) => name), child('leaf', leaf)],
      });

      expect(resource.member('hello')?.kind).toBe('page');
      expect(resource.member('leaf')?.kind).toBe('child');
      expect(resource.member('Hello')).toBeUndefined();
      expect(resource.has('leaf')).toBe(true);
      expect(resource.memberNames()).toEqual(['hello', 'leaf']);
    });

    it('exposes the index and default slots', () => {
      const index = indexPage([], () => 'home');
      const fallback = defaultHandler([positional('slug')], ({ slug }) => slug);
      const resource = new Resource({ name: 'root', index, default: fallback });

      expect(resource.index).toBe(index);
      expect(resource.fallback).toBe(fallback);
      expect(resource.memberNames()).toEqual([]);
    });

    it('describes itself by name', () => {
      expect(String(leaf)).toBe('Resource(leaf)');
    });
  });

  describe('validation', () => {
    it('rejects duplicate member names', () => {
      expect(
        () =>
          new Resource({
            name: 'root',
            members: [page('about', [], () => 'a'), child('about', leaf)],
          })
      ).toThrow("Invalid resource 'root': duplicate member 'about' (page and child)");
    });

    it('rejects members named after a slot', () => {
      expect(
        () => new Resource({ name: 'root', members: [page('index', [], () => 'x')] })
      ).toThrow("'index' is reserved; use the index slot instead");
      expect(
        () => new Resource({ name: 'root', members: [locator('default', [], () => leaf)] })
      ).toThrow("'default' is reserved; use the default slot instead");
    });

    it('rejects member names containing a slash', () => {
      expect(() => new Resource({ name: 'root', members: [child('a/b', leaf)] })).toThrow(
        "member name 'a/b' contains '/'"
      );
    });

    it('rejects empty member names', () => {
      expect(() => new Resource({ name: 'root', members: [child('', leaf)] })).toThrow(
        'member names must be non-empty strings'
      );
    });

    it('rejects a parameter declared twice', () => {
      expect(
        () =>
          new Resource({
            name: 'root',
            members: [page('p', [positional('id'), keyword('id')], () => 'x')],
          })
      ).toThrow("parameter 'id' declared twice on 'p'");
    });

    it('rejects a default without a positional parameter', () => {
      expect(
        () =>
          new Resource({
            name: 'root',
            default: defaultHandler([keyword('slug')], () => 'x'),
          })
      ).toThrow('default needs a positional or rest parameter for the unmatched segment');
    });

    it('accepts a default with only a rest parameter', () => {
      const resource = new Resource({
        name: 'root',
        default: defaultHandler([rest('parts')], ({ parts }) => parts.join(':')),
      });
      expect(resource.fallback?.params.map((param) => param.kind)).toEqual(['rest']);
    });

    it('marks default locators as descending', () => {
      expect(defaultHandler([positional('a')], () => 'x').descends).toBe(false);
      expect(defaultLocator([positional('a')], () => leaf).descends).toBe(true);
    });

    it('rejects a positional parameter after a rest parameter', () => {
      expect(
        () => new Resource({ name: 'root', members: [page('p', [rest('parts'), positional('id')], () => 'x')] })
      ).toThrow("positional parameter 'id' of 'p' follows rest parameter 'parts'");
    });

    it('rejects two rest parameters', () => {
      expect(
        () => new Resource({ name: 'root', members: [page('p', [rest('a'), rest('b')], () => 'x')] })
      ).toThrow("'p' declares more than one rest parameter");
    });

    it('rejects two capture parameters', () => {
      expect(
        () => new Resource({ name: 'root', members: [page('p', [capture('a'), capture('b')], () => 'x')] })
      ).toThrow("'p' declares more than one capture parameter");
    });

    it('allows keyword parameters after a rest parameter', () => {
      const resource = new Resource({
        name: 'root',
        members: [page('p', [rest('parts'), keyword('q'), capture('kw')], () => 'x')],
      });
      expect(resource.has('p')).toBe(true);
    });

    it('rejects a child that is not a Resource', () => {
      const fake: ChildDefinition = {
        kind: 'child',
        name: 'ghost',
        resource: Object.create(null),
      };
      expect(() => new Resource({ name: 'root', members: [fake] })).toThrow(
        "child 'ghost' is not a Resource"
      );
    });

    it('rejects an empty resource name', () => {
      expect(() => new Resource({ name: '' })).toThrow(ResourceDefinitionError);
    });

    it('tags errors with the resource name', () => {
      try {
        new Resource({ name: 'root', members: [child('x', leaf), child('x', leaf)] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ResourceDefinitionError);
        if (error instanceof ResourceDefinitionError) {
          expect(error.resourceName).toBe('root');
          expect(error.name).toBe('ResourceDefinitionError');
        }
      }
    });
  });

  describe('methods', () => {
    const hello = new Resource({
      name: 'hello',
      methods: [methodPage('get', [], () => 'get'), methodPage('PUT', [positional('data')], ({ data }) => data)],
    });

    it('keys pages by upper-case verb', () => {
      expect(hello.methodKeyed).toBe(true);
      expect(hello.allowedMethods()).toEqual(['GET', 'PUT']);
      expect(hello.method('get')?.name).toBe('GET');
      expect(hello.method('Put')?.name).toBe('PUT');
      expect(hello.method('DELETE')).toBeUndefined();
    });

    it('is not method-keyed without methods', () => {
      expect(leaf.methodKeyed).toBe(false);
      expect(leaf.allowedMethods()).toEqual([]);
    });

    it('rejects a verb defined twice', () => {
      expect(
        () =>
          new Resource({
            name: 'hello',
            methods: [methodPage('GET', [], () => 'a'), methodPage('get', [], () => 'b')],
          })
      ).toThrow("Invalid resource 'hello': method 'GET' defined twice");
    });

    it('rejects names that are not verbs', () => {
      expect(
        () => new Resource({ name: 'hello', methods: [page('get-it', [], () => 'a')] })
      ).toThrow("method name 'get-it' is not a verb");
    });

    it('rejects methods next to other slots', () => {
      expect(
        () =>
          new Resource({
            name: 'hello',
            index: indexPage([], () => 'home'),
            methods: [methodPage('GET', [], () => 'a')],
          })
      ).toThrow('a method-keyed resource cannot also have members, an index or a default');
    });
  });

  describe('subclassing', () => {
    class CounterResource extends Resource {
      readonly start: number;

      constructor(start: number) {
        super({ name: 'counter', index: indexPage([], () => start) });
        this.start = start;
      }
    }

    it('keeps application state on subclasses', () => {
      const resource = new CounterResource(3);
      expect(resource).toBeInstanceOf(Resource);
      expect(resource.start).toBe(3);
    });
  });
});
