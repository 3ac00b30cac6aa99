import { describe, expect, it, vi } from 'vitest';

import { handleListTools } from '#handlers/list-tools';
import {
  bindRequestHandler,
  resolveHandlers,
  serverMethods,
} from '#handlers/handler-registry';

import { createContext } from '../fixtures';

import type { ServerRequestHandler } from '#types/handler';

const requestContext = {
  id: 7,
  method: 'tools/call',
  signal: new AbortController().signal,
};

describe('fn:resolveHandlers', () => {
  it('should provide a handler for every method', () => {
    const handlers = resolveHandlers();

    expect(Object.keys(handlers).sort()).toEqual([...serverMethods].sort());
    expect(handlers['tools/list']).toBe(handleListTools);
  });

  it('should prefer the given overrides', () => {
    const listTools = vi.fn<ServerRequestHandler<'tools/list'>>();

    expect(resolveHandlers({ 'tools/list': listTools })['tools/list']).toBe(
      listTools,
    );
  });
});

describe('fn:bindRequestHandler', () => {
  it('should validate the parameters and wrap the result', async () => {
    const context = createContext();
    const callTool = vi.fn<ServerRequestHandler<'tools/call'>>(async () => ({
      content: [],
      isError: false,
    }));
    const handler = bindRequestHandler('tools/call', callTool, () => context);

    await expect(
      handler({ name: 'echo', arguments: { message: 'hi' } }, requestContext),
    ).resolves.toEqual({ result: { content: [], isError: false } });
    expect(callTool).toHaveBeenCalledWith(
      { name: 'echo', arguments: { message: 'hi' } },
      context,
    );
  });

  it('should reject invalid parameters before calling the handler', async () => {
    const callTool = vi.fn<ServerRequestHandler<'tools/call'>>();
    const handler = bindRequestHandler('tools/call', callTool, () =>
      createContext(),
    );

    await expect(handler({}, requestContext)).rejects.toMatchObject({
      code: -32602,
    });
    expect(callTool).not.toHaveBeenCalled();
  });

  it('should treat absent parameters as an empty object', async () => {
    const listTools = vi.fn<ServerRequestHandler<'tools/list'>>(async () => ({
      tools: [],
    }));
    const handler = bindRequestHandler('tools/list', listTools, () =>
      createContext(),
    );

    await handler(undefined, requestContext);

    expect(listTools).toHaveBeenCalledWith({}, expect.anything());
  });
});
