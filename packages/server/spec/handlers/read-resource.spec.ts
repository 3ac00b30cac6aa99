import { describe, expect, it } from 'vitest';

import { handleReadResource } from '#handlers/read-resource';

import { createContext, createState } from '../fixtures';

describe('fn:handleReadResource', () => {
  it('should return the stored text', async () => {
    await expect(
      handleReadResource({ uri: 'memory:///notes' }, createContext()),
    ).resolves.toEqual({
      contents: [
        { uri: 'memory:///notes', mimeType: 'text/plain', text: 'first draft' },
      ],
    });
  });

  it('should read the description of a resource without payload', async () => {
    await expect(
      handleReadResource({ uri: 'memory:///about' }, createContext()),
    ).resolves.toEqual({
      contents: [{ uri: 'memory:///about', text: 'About this server' }],
    });
  });

  it('should reflect a change made in place', async () => {
    const state = createState();
    const notes = state.requireResource('memory:///notes');
    notes.text = 'second draft';

    const { contents } = await handleReadResource(
      { uri: 'memory:///notes' },
      createContext(state),
    );

    expect(contents).toEqual([
      { uri: 'memory:///notes', mimeType: 'text/plain', text: 'second draft' },
    ]);
  });

  it('should fail with resource not found for an unknown uri', async () => {
    await expect(
      handleReadResource({ uri: 'memory:///missing' }, createContext()),
    ).rejects.toMatchObject({
      code: -32001,
      message: 'Resource not found: memory:///missing',
      data: { uri: 'memory:///missing' },
    });
  });
});
