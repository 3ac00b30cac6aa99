import { describe, expect, it } from 'vitest';

import {
  MCP_LOG_LEVELS,
  isLogLevelEnabled,
  isMcpLogLevel,
  normalizeMcpLogLevel,
} from '#logging';

describe('fn:isLogLevelEnabled', () => {
  it('should follow the severity order rather than the lexical one', () => {
    expect(isLogLevelEnabled('info', 'warning')).toBe(false);
    expect(isLogLevelEnabled('error', 'warning')).toBe(true);
    expect(isLogLevelEnabled('alert', 'critical')).toBe(true);
    expect(isLogLevelEnabled('critical', 'alert')).toBe(false);
  });

  it('should let a message at exactly the threshold through', () => {
    for (const level of MCP_LOG_LEVELS) {
      expect(isLogLevelEnabled(level, level)).toBe(true);
    }
  });

  it('should let everything through at the debug threshold', () => {
    const enabled = MCP_LOG_LEVELS.filter((level) =>
      isLogLevelEnabled(level, 'debug'),
    );

    expect(enabled).toEqual([...MCP_LOG_LEVELS]);
  });
});

describe('fn:isMcpLogLevel', () => {
  it('should recognise the eight protocol levels only', () => {
    expect(isMcpLogLevel('notice')).toBe(true);
    expect(isMcpLogLevel('warn')).toBe(false);
    expect(isMcpLogLevel('verbose')).toBe(false);
  });
});

describe('fn:normalizeMcpLogLevel', () => {
  it('should lowercase and trim level names', () => {
    expect(normalizeMcpLogLevel(' WARNING ')).toBe('warning');
  });

  it('should resolve common aliases', () => {
    expect(normalizeMcpLogLevel('warn')).toBe('warning');
    expect(normalizeMcpLogLevel('Fatal')).toBe('emergency');
  });

  it('should return undefined for unknown names', () => {
    expect(normalizeMcpLogLevel('verbose')).toBeUndefined();
  });
});
