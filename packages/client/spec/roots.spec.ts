import { describe, expect, it, vi } from 'vitest';

import { RootManager } from '#roots';

import type { Root } from '@duplexmcp/protocol';

// CONSTANTS //

const work: Root = { uri: 'file:///work', name: 'work' };

const notes: Root = { uri: 'file:///notes' };

// TEST SUITES //

describe('cl:RootManager', () => {
  describe('mt:getRoots', () => {
    it('should return a copy of the initial roots', () => {
      const initial = [work];
      const manager = new RootManager(initial, vi.fn(async () => {}));

      const roots = manager.getRoots();
      roots.push(notes);
      initial.push(notes);

      expect(manager.getRoots()).toEqual([work]);
    });
  });

  describe('mt:setRoots', () => {
    it('should replace the whole set and announce it', async () => {
      const announce = vi.fn(async () => {});
      const manager = new RootManager([work], announce);

      await manager.setRoots([notes]);

      expect(manager.getRoots()).toEqual([notes]);
      expect(announce).toHaveBeenCalledTimes(1);
    });
  });

  describe('mt:addRoot', () => {
    it('should add a new root and announce it', async () => {
      const announce = vi.fn(async () => {});
      const manager = new RootManager([work], announce);

      await expect(manager.addRoot(notes)).resolves.toBe(true);

      expect(manager.getRoots()).toEqual([work, notes]);
      expect(announce).toHaveBeenCalledTimes(1);
    });

    it('should ignore a root already declared', async () => {
      const announce = vi.fn(async () => {});
      const manager = new RootManager([work], announce);

      await expect(
        manager.addRoot({ uri: 'file:///work', name: 'other' }),
      ).resolves.toBe(false);

      expect(manager.getRoots()).toEqual([work]);
      expect(announce).not.toHaveBeenCalled();
    });
  });

  describe('mt:removeRoot', () => {
    it('should remove a root and announce it', async () => {
      const announce = vi.fn(async () => {});
      const manager = new RootManager([work, notes], announce);

      await expect(manager.removeRoot('file:///work')).resolves.toBe(true);

      expect(manager.getRoots()).toEqual([notes]);
      expect(announce).toHaveBeenCalledTimes(1);
    });

    it('should report an unknown uri', async () => {
      const announce = vi.fn(async () => {});
      const manager = new RootManager([work], announce);

      await expect(manager.removeRoot('file:///missing')).resolves.toBe(false);

      expect(announce).not.toHaveBeenCalled();
    });
  });
});
