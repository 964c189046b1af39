/**
 * Resolver module.
 *
 * Method selection, the traversal state machine and routing errors.
 */

export {
  createResolutionContext,
  DEFAULT_METHOD,
  type ResolutionContext,
  record,
  type TraceEntry,
  type TraceStep,
} from './context.js';
export {
  LocatorResultError,
  MethodNotAllowedError,
  NotFoundError,
  ResolutionAbortedError,
  type RootAttempt,
  RoutingError,
} from './errors.js';
export { type Selection, selectMember } from './method-selector.js';
export {
  afterInvocation,
  type DescendingState,
  type FailedState,
  type InvokingState,
  type Invocation,
  invoke,
  type RedescendingState,
  type RejectedState,
  type ResolveOptions,
  Resolver,
  type ResolverState,
  resolveResource,
  type SteppableState,
  type SucceededState,
  transition,
} from './resolver.js';
