import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadConfig } from '../src/core/config.js';
import { createConsoleSink, formatDiagnostic } from '../src/core/diagnostics.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', defaultMonths: 12 });
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      FILING_STATEMENTS_LOG_LEVEL: 'debug',
      FILING_STATEMENTS_DEFAULT_MONTHS: '3',
    });
    expect(config).toEqual({ logLevel: 'debug', defaultMonths: 3 });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ FILING_STATEMENTS_LOG_LEVEL: 'loud' })).toThrow();
  });

  it('rejects a period longer than a year', () => {
    expect(() => loadConfig({ FILING_STATEMENTS_DEFAULT_MONTHS: '13' })).toThrow();
  });
});

describe('diagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats context as key=value pairs', () => {
    const line = formatDiagnostic({
      level: 'warn',
      message: 'Value is not numeric',
      context: { text: 'n/a', column: 2, concept: null },
    });
    expect(line).toBe('Value is not numeric (text="n/a" column=2 concept=null)');
  });

  it('formats a bare message without parentheses', () => {
    expect(formatDiagnostic({ level: 'debug', message: 'skipped', context: {} })).toBe('skipped');
  });

  it('console sink filters by level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const sink = createConsoleSink('warn');
    sink({ level: 'debug', message: 'hidden', context: {} });
    sink({ level: 'warn', message: 'shown', context: {} });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('silent sink prints nothing', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleSink('silent')({ level: 'warn', message: 'hidden', context: {} });
    expect(spy).not.toHaveBeenCalled();
  });
});
