/**
 * Site configuration.
 *
 * Explicit options win; unset options fall back to environment variables,
 * then to defaults.
 *
 * Environment:
 * - PATHWALK_SITE_NAME: name used in logs and events (default: site)
 * - PATHWALK_MAX_REWRITES: rewrites `dispatch` follows (default: 8)
 */

import { SiteConfigError } from './errors.js';

export const DEFAULT_SITE_NAME = 'site';
export const DEFAULT_MAX_REWRITES = 8;

/**
 * Options accepted by the Site constructor.
 */
export interface SiteConfig {
  /** Name used in log fields */
  name?: string;

  /** Rewrites followed by a single dispatch before it fails */
  maxRewrites?: number;
}

/**
 * Configuration with every option filled in.
 */
export interface ResolvedSiteConfig {
  name: string;
  maxRewrites: number;
}

function parseMaxRewrites(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new SiteConfigError('maxRewrites', `PATHWALK_MAX_REWRITES must be a non-negative integer, got '${raw}'`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Fill in unset options from the environment and defaults.
 *
 * @throws SiteConfigError if an option is out of range
 *
 * @example
 * resolveSiteConfig({ maxRewrites: 2 }, {}); // { name: 'site', maxRewrites: 2 }
 */
export function resolveSiteConfig(
  config: SiteConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedSiteConfig {
  const envMaxRewrites = env.PATHWALK_MAX_REWRITES;
  const maxRewrites =
    config.maxRewrites ??
    (envMaxRewrites !== undefined && envMaxRewrites !== ''
      ? parseMaxRewrites(envMaxRewrites)
      : DEFAULT_MAX_REWRITES);

  if (!Number.isInteger(maxRewrites) || maxRewrites < 0) {
    throw new SiteConfigError('maxRewrites', `must be a non-negative integer, got ${maxRewrites}`);
  }

  const name = config.name ?? env.PATHWALK_SITE_NAME ?? DEFAULT_SITE_NAME;
  if (name.length === 0) {
    throw new SiteConfigError('name', 'must not be empty');
  }

  return { name, maxRewrites };
}
