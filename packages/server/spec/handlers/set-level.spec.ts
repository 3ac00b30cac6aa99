import { describe, expect, it } from 'vitest';

import { handleSetLevel } from '#handlers/set-level';

import { createContext, createState } from '../fixtures';

describe('fn:handleSetLevel', () => {
  it('should update the threshold', async () => {
    const state = createState();

    await expect(
      handleSetLevel({ level: 'warning' }, createContext(state)),
    ).resolves.toEqual({});
    expect(state.logLevel).toBe('warning');
  });
});
