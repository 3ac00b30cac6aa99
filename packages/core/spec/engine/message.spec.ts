import { describe, expect, it } from 'vitest';

import {
  classifyMessage,
  createNotificationMessage,
  createResponseMessage,
} from '#engine/message';

describe('fn:classifyMessage', () => {
  it('should classify a request', () => {
    expect(
      classifyMessage({
        jsonrpc: '2.0',
        id: 4,
        method: 'tools/call',
        params: { name: 'echo' },
      }),
    ).toEqual({
      kind: 'request',
      id: 4,
      method: 'tools/call',
      params: { name: 'echo' },
    });
  });

  it('should classify a notification', () => {
    expect(
      classifyMessage({ jsonrpc: '2.0', method: 'notifications/initialized' }),
    ).toEqual({ kind: 'notification', method: 'notifications/initialized' });
  });

  it('should classify a successful response', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 2, result: {} })).toEqual({
      kind: 'result',
      id: 2,
      result: {},
    });
  });

  it('should classify an error response, with or without id', () => {
    const error = { code: -32600, message: 'Invalid request' };

    expect(classifyMessage({ jsonrpc: '2.0', id: 9, error })).toEqual({
      kind: 'error',
      id: 9,
      error,
    });
    expect(classifyMessage({ jsonrpc: '2.0', error })).toEqual({
      kind: 'error',
      error,
    });
  });
});

describe('fn:createResponseMessage', () => {
  it('should wrap a result', () => {
    expect(createResponseMessage(1, { result: { tools: [] } })).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { tools: [] },
    });
  });

  it('should wrap an error', () => {
    expect(
      createResponseMessage('a', {
        error: { code: -32002, message: 'Unknown tool: missing' },
      }),
    ).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      error: { code: -32002, message: 'Unknown tool: missing' },
    });
  });
});

describe('fn:createNotificationMessage', () => {
  it('should leave params out when none are given', () => {
    const message = createNotificationMessage(
      'notifications/tools/list_changed',
    );

    expect(message).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/tools/list_changed',
    });
    expect('params' in message).toBe(false);
  });
});
