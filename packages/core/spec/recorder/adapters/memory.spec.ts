import { describe, expect, it, vi } from 'vitest';

import { MemoryEventRecorder } from '#recorder/adapters/memory';

import type { EventInput } from '#recorder/recorder';

const ping = (id: number): EventInput => ({
  role: 'client',
  direction: 'outbound',
  channel: 'test-channel',
  payload: { jsonrpc: '2.0', id, method: 'ping' },
});

describe('cl:MemoryEventRecorder', () => {
  describe('mt:record', () => {
    it('should assign ids from 0 and a timestamp', () => {
      const recorder = new MemoryEventRecorder({ now: () => 1700000000000 });

      const first = recorder.record(ping(1));
      const second = recorder.record(ping(2));

      expect(first).toEqual({ id: 0, occurredAt: 1700000000000, ...ping(1) });
      expect(second.id).toBe(1);
    });

    it('should drop the oldest events beyond maxEvents without reusing ids', () => {
      const recorder = new MemoryEventRecorder({ maxEvents: 2 });

      recorder.record(ping(1));
      recorder.record(ping(2));
      recorder.record(ping(3));

      expect(recorder.size).toBe(2);
      expect(recorder.query().map(({ id }) => id)).toEqual([1, 2]);
    });
  });

  describe('mt:query', () => {
    it('should return events with an id strictly greater than sinceId', () => {
      const recorder = new MemoryEventRecorder();
      recorder.record(ping(1));
      recorder.record(ping(2));
      recorder.record(ping(3));

      expect(recorder.query().map(({ id }) => id)).toEqual([0, 1, 2]);
      expect(recorder.query(0).map(({ id }) => id)).toEqual([1, 2]);
      expect(recorder.query(2)).toEqual([]);
    });
  });

  describe('mt:subscribe', () => {
    it('should notify listeners until they unsubscribe', () => {
      const recorder = new MemoryEventRecorder();
      const listener = vi.fn();

      const unsubscribe = recorder.subscribe(listener);
      recorder.record(ping(1));
      unsubscribe();
      recorder.record(ping(2));

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ id: 0, ...ping(1) }),
      );
    });
  });

  describe('mt:reset', () => {
    it('should forget stored events but keep counting ids', () => {
      const recorder = new MemoryEventRecorder();
      recorder.record(ping(1));

      recorder.reset();
      const next = recorder.record(ping(2));

      expect(recorder.query()).toEqual([next]);
      expect(next.id).toBe(1);
    });
  });
});
