/**
 * Site event emitter tests.
 *
 * Verifies that SiteEventEmitter emits events with proper payloads.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SiteEventEmitter } from '../../../src/events/event-emitter.js';
import { EventNames, ResolutionEventNames } from '../../../src/events/event-names.js';

describe('SiteEventEmitter', () => {
  let emitter: SiteEventEmitter;

  beforeEach(() => {
    emitter = new SiteEventEmitter();
  });

  describe('event subscription', () => {
    it('allows multiple subscribers to the same event', () => {
      emitter.on('resolution.started', vi.fn());
      emitter.on('resolution.started', vi.fn());
      expect(emitter.listenerCount('resolution.started')).toBe(2);
    });

    it('allows unsubscribing from events', () => {
      const handler = vi.fn();
      emitter.on('resolution.succeeded', handler);
      emitter.off('resolution.succeeded', handler);
      emitter.emitSucceeded('r1', 'root', 3);
      expect(handler).not.toHaveBeenCalled();
    });

    it('supports one-time listeners', () => {
      const handler = vi.fn();
      emitter.once('resolution.not_found', handler);
      emitter.emitNotFound('r1', ['a'], 1);
      emitter.emitNotFound('r2', ['b'], 1);
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('payloads', () => {
    it('emits started with the path and a start time', () => {
      const handler = vi.fn();
      emitter.on(ResolutionEventNames.RESOLUTION_STARTED, handler);

      emitter.emitStarted('r1', ['forum', '12']);

      expect(handler).toHaveBeenCalledTimes(1);
      const [payload] = handler.mock.calls[0] ?? [];
      expect(payload.resolutionId).toBe('r1');
      expect(payload.path).toEqual(['forum', '12']);
      expect(payload.startedAt).toBeInstanceOf(Date);
    });

    it('emits root_missed with the reason', () => {
      const handler = vi.fn();
      emitter.on('resolution.root_missed', handler);
      emitter.emitRootMissed('r1', 'legacy', "'legacy' has no index");
      expect(handler).toHaveBeenCalledWith({
        resolutionId: 'r1',
        root: 'legacy',
        reason: "'legacy' has no index",
      });
    });

    it('emits failed with the error', () => {
      const handler = vi.fn();
      const error = new Error('boom');
      emitter.on('resolution.failed', handler);
      emitter.emitFailed('r1', 'root', error, 5);
      expect(handler).toHaveBeenCalledWith({ resolutionId: 'r1', root: 'root', error, durationMs: 5 });
    });

    it('emits rewritten with both paths', () => {
      const handler = vi.fn();
      emitter.on(EventNames.DISPATCH_REWRITTEN, handler);
      emitter.emitRewritten(['old'], ['new'], 1);
      expect(handler).toHaveBeenCalledWith({ from: ['old'], to: ['new'], rewrites: 1 });
    });
  });
});

describe('EventNames', () => {
  it('combines resolution and dispatch events', () => {
    expect(Object.values(EventNames)).toEqual([
      'resolution.started',
      'resolution.root_missed',
      'resolution.succeeded',
      'resolution.not_found',
      'resolution.failed',
      'dispatch.rewritten',
    ]);
  });
});
