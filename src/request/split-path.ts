/**
 * Path splitting.
 *
 * Turns a URL path into the segment list the resolver consumes: leading and
 * trailing slashes are dropped (so `/about/` and `/about` are the same
 * path), the rest is split on `/` and each segment is percent-decoded.
 * Empty segments in the middle (`a//b`) are kept and simply match nothing.
 */

import { NotFoundError } from '../resolver/errors.js';

/**
 * Split and decode a URL path.
 *
 * @throws NotFoundError if a segment holds a malformed percent escape
 *
 * @example
 * splitPath('/forum/12/topic/'); // ['forum', '12', 'topic']
 * splitPath('/');                // []
 * splitPath('/a%20b');           // ['a b']
 */
export function splitPath(path: string): string[] {
  const trimmed = path.replace(/^\/+|\/+$/g, '');
  if (trimmed.length === 0) {
    return [];
  }

  return trimmed.split('/').map((segment) => {
    try {
      return decodeURIComponent(segment);
    } catch (error) {
      if (error instanceof URIError) {
        throw new NotFoundError(`Malformed percent-encoding in segment '${segment}'`);
      }
      throw error;
    }
  });
}
