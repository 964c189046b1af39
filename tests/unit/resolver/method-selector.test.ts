/**
 * Method selector tests.
 */

import { describe, expect, it } from 'vitest';
import { positional } from '../../../src/params/descriptor.js';
import { defineResource } from '../../../src/resource/builder.js';
import { selectMember } from '../../../src/resolver/method-selector.js';

const leaf = defineResource('leaf', (r) => r.index([], () => 'leaf'));

const full = defineResource('full', (r) =>
  r
    .index([], () => 'home')
    .page('about', [], () => 'about')
    .child('leaf', leaf)
    .locator('item', [positional('id')], () => leaf)
    .default([positional('slug')], ({ slug }) => slug)
);

const bare = defineResource('bare', (r) => r.page('about', [], () => 'about'));

const hello = defineResource('hello', (r) =>
  r.method('GET', [], () => 'get').method('PUT', [positional('data')], ({ data }) => data)
);

describe('selectMember', () => {
  it('selects a page by name', () => {
    const selection = selectMember(full, 'about');
    expect(selection.kind).toBe('page');
  });

  it('selects a child by name', () => {
    const selection = selectMember(full, 'leaf');
    expect(selection).toEqual({ kind: 'child', resource: leaf });
  });

  it('selects a locator by name', () => {
    expect(selectMember(full, 'item').kind).toBe('locator');
  });

  it('selects the index when the path is exhausted', () => {
    const selection = selectMember(full, null);
    expect(selection).toEqual({ kind: 'index', definition: full.index });
  });

  it('misses when the path is exhausted and there is no index', () => {
    expect(selectMember(bare, null)).toEqual({ kind: 'none', reason: "'bare' has no index" });
  });

  it('selects the default for an unmatched segment', () => {
    expect(selectMember(full, 'anything')).toEqual({ kind: 'default', definition: full.fallback });
  });

  it('misses an unmatched segment without a default', () => {
    expect(selectMember(bare, 'anything')).toEqual({
      kind: 'none',
      reason: "'bare' has no member 'anything'",
    });
  });

  it('matches names case-sensitively', () => {
    expect(selectMember(bare, 'About').kind).toBe('none');
  });

  it('does not treat slot names as members', () => {
    expect(selectMember(full, 'index').kind).toBe('default');
    expect(selectMember(bare, 'index').kind).toBe('none');
    expect(selectMember(bare, 'default').kind).toBe('none');
  });

  describe('method-keyed resources', () => {
    it('selects the page for the request method whatever the segment', () => {
      const selection = selectMember(hello, 'value', 'PUT');
      expect(selection.kind).toBe('method');
      if (selection.kind === 'method') {
        expect(selection.definition.name).toBe('PUT');
      }
      expect(selectMember(hello, null, 'GET').kind).toBe('method');
    });

    it('defaults to GET', () => {
      expect(selectMember(hello, null).kind).toBe('method');
    });

    it('lists the allowed methods for an unknown one', () => {
      expect(selectMember(hello, null, 'FIX')).toEqual({ kind: 'method_not_allowed', allowed: ['GET', 'PUT'] });
    });
  });
});
