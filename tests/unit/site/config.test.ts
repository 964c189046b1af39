/**
 * Site configuration tests.
 */

import { describe, expect, it } from 'vitest';
import { resolveSiteConfig } from '../../../src/site/config.js';
import { SiteConfigError } from '../../../src/site/errors.js';

describe('resolveSiteConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(resolveSiteConfig({}, {})).toEqual({ name: 'site', maxRewrites: 8 });
  });

  it('reads the environment', () => {
    const env = { PATHWALK_SITE_NAME: 'blog', PATHWALK_MAX_REWRITES: '3' };
    expect(resolveSiteConfig({}, env)).toEqual({ name: 'blog', maxRewrites: 3 });
  });

  it('prefers explicit options over the environment', () => {
    const env = { PATHWALK_SITE_NAME: 'blog', PATHWALK_MAX_REWRITES: '3' };
    expect(resolveSiteConfig({ name: 'shop', maxRewrites: 1 }, env)).toEqual({
      name: 'shop',
      maxRewrites: 1,
    });
  });

  it('ignores an empty environment value', () => {
    expect(resolveSiteConfig({}, { PATHWALK_MAX_REWRITES: '' }).maxRewrites).toBe(8);
  });

  it('rejects a malformed environment value', () => {
    expect(() => resolveSiteConfig({}, { PATHWALK_MAX_REWRITES: 'lots' })).toThrow(
      "Invalid site option 'maxRewrites': PATHWALK_MAX_REWRITES must be a non-negative integer, got 'lots'"
    );
  });

  it('rejects a negative or fractional limit', () => {
    expect(() => resolveSiteConfig({ maxRewrites: -1 }, {})).toThrow(SiteConfigError);
    expect(() => resolveSiteConfig({ maxRewrites: 1.5 }, {})).toThrow(SiteConfigError);
  });

  it('rejects an empty name', () => {
    expect(() => resolveSiteConfig({ name: '' }, {})).toThrow("Invalid site option 'name': must not be empty");
  });
});
