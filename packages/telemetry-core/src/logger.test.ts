import { afterEach, describe, expect, it } from 'vitest';
import { createModuleLogger, formatLogMetadata, isLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('מחיל את setLogLevel על לוגרים קיימים ועל חדשים', () => {
    const before = createModuleLogger('LoggerTestBefore');

    setLogLevel('trace');
    const after = createModuleLogger('LoggerTestAfter');

    expect(before.level).toBe('trace');
    expect(after.level).toBe('trace');
    expect(typeof after.trace).toBe('function');
  });

  it('recognizes the configured levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('formats metadata as key=value pairs', () => {
    expect(formatLogMetadata({})).toBe('');
    expect(formatLogMetadata({ kind: 'network', consecutiveFailures: 2 })).toBe(' kind="network" consecutiveFailures=2');
    expect(formatLogMetadata({ error: { code: 'ECONNRESET', syscall: 'read' } }))
      .toBe(' error=PotentialError: { code: "ECONNRESET", syscall: "read" }');
  });
});
