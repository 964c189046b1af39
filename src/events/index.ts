/**
 * Events module.
 *
 * Provides event names and the typed Site event emitter.
 */

// Event emitter
export {
  type ResolutionFailedPayload,
  type ResolutionNotFoundPayload,
  type ResolutionStartedPayload,
  type ResolutionSucceededPayload,
  type RewrittenPayload,
  type RootMissedPayload,
  SiteEventEmitter,
  type SiteEventMap,
} from './event-emitter.js';
// Event names
export {
  DispatchEventNames,
  type EventName,
  EventNames,
  type ResolutionEventName,
  ResolutionEventNames,
} from './event-names.js';
