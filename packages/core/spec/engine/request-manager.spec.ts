import { describe, expect, it } from 'vitest';

import { RequestManager } from '#engine/request-manager';

describe('cl:RequestManager', () => {
  describe('mt:createRequest', () => {
    it('should create requests with strictly increasing ids starting at 1', () => {
      const manager = new RequestManager();

      const first = manager.createRequest('tools/list');
      const second = manager.createRequest('tools/list');
      const third = manager.createRequest('prompts/list');

      expect([first.id, second.id, third.id]).toEqual([1, 2, 3]);
    });

    it('should announce the id of the next request', () => {
      const manager = new RequestManager();

      expect(manager.nextId).toBe(1);

      manager.createRequest('ping');

      expect(manager.nextId).toBe(2);
    });

    it('should create request with proper message envelope', () => {
      const manager = new RequestManager();

      const { message } = manager.createRequest('tools/call', {
        name: 'echo',
      });

      expect(message).toEqual({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/call',
        params: { name: 'echo' },
      });
    });

    it('should leave params out when none are given', () => {
      const manager = new RequestManager();

      const { message } = manager.createRequest('roots/list');

      expect(Object.keys(message)).toEqual(['jsonrpc', 'id', 'method']);
    });

    it('should track pending request count', () => {
      const manager = new RequestManager();

      expect(manager.pendingCount).toBe(0);

      manager.createRequest('tools/list');
      expect(manager.pendingCount).toBe(1);

      manager.createRequest('prompts/list');
      expect(manager.pendingCount).toBe(2);
    });
  });

  describe('mt:resolveRequest', () => {
    it('should resolve existing request and remove from pending', async () => {
      const manager = new RequestManager();
      const { id, promise } = manager.createRequest('tools/list');

      const resolved = manager.resolveRequest(id, { tools: [] });

      expect(resolved).toBe(true);
      expect(manager.pendingCount).toBe(0);
      await expect(promise).resolves.toEqual({ tools: [] });
    });

    it('should return false when resolving non-existent request', () => {
      const manager = new RequestManager();

      const resolved = manager.resolveRequest(999, {});

      expect(resolved).toBe(false);
    });
  });

  describe('mt:rejectRequest', () => {
    it('should reject existing request and remove from pending', async () => {
      const manager = new RequestManager();
      const { id, promise } = manager.createRequest('tools/call');

      const rejected = manager.rejectRequest(id, new Error('denied'));

      expect(rejected).toBe(true);
      expect(manager.pendingCount).toBe(0);
      await expect(promise).rejects.toThrow('denied');
    });

    it('should return false when rejecting non-existent request', () => {
      const manager = new RequestManager();

      expect(manager.rejectRequest(42, new Error('denied'))).toBe(false);
    });
  });

  describe('mt:rejectAll', () => {
    it('should reject every pending request with the same reason', async () => {
      const manager = new RequestManager();
      const first = manager.createRequest('tools/list');
      const second = manager.createRequest('prompts/list');
      const reason = new Error('closed');

      const count = manager.rejectAll(reason);

      expect(count).toBe(2);
      expect(manager.pendingCount).toBe(0);
      await expect(first.promise).rejects.toBe(reason);
      await expect(second.promise).rejects.toBe(reason);
    });
  });

  describe('mt:getRequest', () => {
    it('should return metadata of a pending request', () => {
      const manager = new RequestManager();
      const { id } = manager.createRequest('resources/read', {
        uri: 'memory:///notes/demo',
      });

      expect(manager.getRequest(id)?.request).toEqual({
        id: 1,
        method: 'resources/read',
      });
      expect(manager.getRequestDuration(id)).toBeGreaterThanOrEqual(0);
      expect(manager.getRequestDuration(2)).toBeUndefined();
    });
  });
});
