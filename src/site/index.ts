export {
  DEFAULT_MAX_REWRITES,
  DEFAULT_SITE_NAME,
  type ResolvedSiteConfig,
  resolveSiteConfig,
  type SiteConfig,
} from './config.js';
export { PathRewrite, RewriteLimitError, SiteConfigError } from './errors.js';
export { Site } from './site.js';
export type {
  ApplicationErrorOutcome,
  DispatchInput,
  DispatchOutcome,
  FoundOutcome,
  MethodNotAllowedOutcome,
  NotFoundOutcome,
  SiteResolveOptions,
} from './types.js';
