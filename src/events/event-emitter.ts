/**
 * Typed event emitter for Site lifecycle events.
 */

import { EventEmitter } from 'eventemitter3';
import { DispatchEventNames, ResolutionEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface ResolutionStartedPayload {
  resolutionId: string;
  path: readonly string[];
  startedAt: Date;
}

export interface RootMissedPayload {
  resolutionId: string;
  root: string;
  reason: string;
}

export interface ResolutionSucceededPayload {
  resolutionId: string;
  root: string;
  durationMs: number;
}

export interface ResolutionNotFoundPayload {
  resolutionId: string;
  path: readonly string[];
  durationMs: number;
}

export interface ResolutionFailedPayload {
  resolutionId: string;
  root: string;
  error: unknown;
  durationMs: number;
}

export interface RewrittenPayload {
  from: readonly string[];
  to: readonly string[];
  rewrites: number;
}

/**
 * Event map for type-safe event handling
 */
export interface SiteEventMap {
  'resolution.started': [ResolutionStartedPayload];
  'resolution.root_missed': [RootMissedPayload];
  'resolution.succeeded': [ResolutionSucceededPayload];
  'resolution.not_found': [ResolutionNotFoundPayload];
  'resolution.failed': [ResolutionFailedPayload];
  'dispatch.rewritten': [RewrittenPayload];
}

/**
 * Type-safe event emitter for Site events
 */
export class SiteEventEmitter extends EventEmitter<SiteEventMap> {
  emitStarted(resolutionId: string, path: readonly string[]): void {
    this.emit(ResolutionEventNames.RESOLUTION_STARTED, {
      resolutionId,
      path,
      startedAt: new Date(),
    });
  }

  emitRootMissed(resolutionId: string, root: string, reason: string): void {
    this.emit(ResolutionEventNames.RESOLUTION_ROOT_MISSED, { resolutionId, root, reason });
  }

  emitSucceeded(resolutionId: string, root: string, durationMs: number): void {
    this.emit(ResolutionEventNames.RESOLUTION_SUCCEEDED, { resolutionId, root, durationMs });
  }

  emitNotFound(resolutionId: string, path: readonly string[], durationMs: number): void {
    this.emit(ResolutionEventNames.RESOLUTION_NOT_FOUND, { resolutionId, path, durationMs });
  }

  emitFailed(resolutionId: string, root: string, error: unknown, durationMs: number): void {
    this.emit(ResolutionEventNames.RESOLUTION_FAILED, { resolutionId, root, error, durationMs });
  }

  emitRewritten(from: readonly string[], to: readonly string[], rewrites: number): void {
    this.emit(DispatchEventNames.DISPATCH_REWRITTEN, { from, to, rewrites });
  }
}
