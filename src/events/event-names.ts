/**
 * Event names emitted by a Site.
 */

/**
 * Event names for the resolution lifecycle
 */
export const ResolutionEventNames = {
  /** Emitted when a Site starts resolving a path */
  RESOLUTION_STARTED: 'resolution.started',

  /** Emitted when a root answered NotFound and the next root is tried */
  RESOLUTION_ROOT_MISSED: 'resolution.root_missed',

  /** Emitted when a root produced a value */
  RESOLUTION_SUCCEEDED: 'resolution.succeeded',

  /** Emitted when every root answered NotFound */
  RESOLUTION_NOT_FOUND: 'resolution.not_found',

  /** Emitted when an application error escaped a handler */
  RESOLUTION_FAILED: 'resolution.failed',
} as const;

/**
 * Event names for dispatch
 */
export const DispatchEventNames = {
  /** Emitted when a page asked for an internal path rewrite */
  DISPATCH_REWRITTEN: 'dispatch.rewritten',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...ResolutionEventNames,
  ...DispatchEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type EventName = (typeof EventNames)[keyof typeof EventNames];

/**
 * Type representing resolution event names
 */
export type ResolutionEventName = (typeof ResolutionEventNames)[keyof typeof ResolutionEventNames];
