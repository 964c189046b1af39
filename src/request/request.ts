/**
 * Route requests: the already-parsed input a Site dispatches.
 */

import { mergeValues, type ValueBag } from '../params/value-bag.js';
import { splitPath } from './split-path.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Path segments plus the merged named values of one request.
 */
export interface RouteRequest {
  readonly segments: readonly string[];
  readonly values: ValueBag;
  /** Request method; GET when absent */
  readonly method?: string;
}

/**
 * Body of a request, as far as binding is concerned.
 */
export interface FormBody {
  contentType: string | null;
  body: string;
}

function isUrlEncoded(contentType: string | null): boolean {
  if (!contentType) {
    return false;
  }
  const [mediaType] = contentType.split(';');
  return mediaType !== undefined && mediaType.trim().toLowerCase() === FORM_CONTENT_TYPE;
}

export interface RouteRequestInit {
  /** Request method, GET by default */
  method?: string;
  form?: FormBody;
}

/**
 * Split a request target into its raw path and query string. The fragment
 * is dropped; nothing in the path is normalized.
 */
function splitTarget(target: string): { path: string; query: string } {
  const hash = target.indexOf('#');
  const withoutFragment = hash === -1 ? target : target.slice(0, hash);
  const mark = withoutFragment.indexOf('?');
  if (mark === -1) {
    return { path: withoutFragment, query: '' };
  }
  return { path: withoutFragment.slice(0, mark), query: withoutFragment.slice(mark + 1) };
}

/**
 * Build a route request from a request target and an optional form body.
 *
 * A string target is taken as sent: repeated slashes and dot segments are
 * not collapsed, so `'/a/../admin'` gives the segments `a`, `..`, `admin`.
 * A URL object is read through its already parsed `pathname`.
 *
 * Query parameters are read first and urlencoded form fields second, so a
 * form field overrides a query parameter with the same name. Bodies of any
 * other content type are ignored.
 *
 * @example
 * ```typescript
 * const request = requestFromUrl('/forum/12/topic/10?offset=20');
 * // { segments: ['forum', '12', 'topic', '10'], values: Map { 'offset' => '20' }, method: 'GET' }
 * ```
 */
export function requestFromUrl(url: string | URL, init: RouteRequestInit = {}): RouteRequest {
  const { form } = init;
  const formValues =
    form && isUrlEncoded(form.contentType) ? new URLSearchParams(form.body) : null;
  const method = (init.method ?? 'GET').toUpperCase();

  if (typeof url !== 'string') {
    return {
      segments: splitPath(url.pathname),
      values: mergeValues(url.searchParams, formValues),
      method,
    };
  }

  const { path, query } = splitTarget(url);
  return {
    segments: splitPath(path),
    values: mergeValues(new URLSearchParams(query), formValues),
    method,
  };
}
