/**
 * Construction-time errors for resources.
 */

import { RoutingError } from '../resolver/errors.js';

/**
 * A resource definition is malformed: duplicate member names, a reserved
 * name, an index that is not a page, a default without positional
 * parameters, and so on. Raised while the tree is built, never per request.
 */
export class ResourceDefinitionError extends RoutingError {
  readonly resourceName: string;

  constructor(resourceName: string, message: string) {
    super(`Invalid resource '${resourceName}': ${message}`);
    this.name = 'ResourceDefinitionError';
    this.resourceName = resourceName;
  }
}
