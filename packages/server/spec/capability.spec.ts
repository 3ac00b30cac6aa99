import { describe, expect, it } from 'vitest';

import { createCapabilities } from '#capability';

const empty = {
  tools: new Map(),
  resources: new Map(),
  resourceTemplates: new Map(),
  prompts: new Map(),
};

describe('fn:createCapabilities', () => {
  it('should only announce logging for empty registries', () => {
    expect(createCapabilities(empty)).toEqual({ logging: {} });
  });

  it('should announce the blocks of the registries in use', () => {
    const capabilities = createCapabilities({
      ...empty,
      tools: new Map([['echo', {}]]),
      resources: new Map([['memory:///notes', {}]]),
    });

    expect(capabilities).toEqual({
      logging: {},
      resources: { listChanged: true, subscribe: true },
      tools: { listChanged: true },
    });
    expect(capabilities).not.toHaveProperty('prompts');
  });

  it('should announce resources for templates alone', () => {
    expect(
      createCapabilities({
        ...empty,
        resourceTemplates: new Map([['memory:///{name}', {}]]),
      }),
    ).toEqual({
      logging: {},
      resources: { listChanged: true, subscribe: true },
    });
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(createCapabilities(empty))).toBe(true);
  });
});
