import { describe, it, expect } from 'vitest';
import { ConfigError, LogLevel, applyConfigDefaults, configFromEnv, loadConfig } from '../index.js';

describe('applyConfigDefaults', () => {
  it('fills in every default', () => {
    expect(applyConfigDefaults()).toEqual({
      logLevel: LogLevel.INFO,
      logFormat: 'text',
      colors: true,
      enableGraphCache: true,
      historyLimit: 100,
    });
  });

  it('keeps explicit values', () => {
    const config = applyConfigDefaults({ defaultStrategy: 'delegated', facadeTimeoutMs: 500, historyLimit: 0 });

    expect(config.defaultStrategy).toBe('delegated');
    expect(config.facadeTimeoutMs).toBe(500);
    expect(config.historyLimit).toBe(0);
  });

  it('names the offending option', () => {
    expect(() => applyConfigDefaults({ historyLimit: -1 })).toThrow(ConfigError);
    expect(() => applyConfigDefaults({ historyLimit: -1 })).toThrow(
      'Invalid engine config "historyLimit": Number must be greater than or equal to 0'
    );
  });
});

describe('configFromEnv', () => {
  it('reads and normalizes GRIDPLAN_* variables', () => {
    expect(
      configFromEnv({
        GRIDPLAN_LOG_LEVEL: ' DEBUG ',
        GRIDPLAN_LOG_FORMAT: 'JSON',
        GRIDPLAN_FACADE_TIMEOUT_MS: '2500',
        GRIDPLAN_STRATEGY: ' delegated ',
        NO_COLOR: '1',
      })
    ).toEqual({
      logLevel: 'debug',
      logFormat: 'json',
      facadeTimeoutMs: 2500,
      defaultStrategy: 'delegated',
      colors: false,
    });
  });

  it('ignores unset variables', () => {
    expect(configFromEnv({})).toEqual({});
  });
});

describe('loadConfig', () => {
  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig(
      { logLevel: LogLevel.ERROR, facadeTimeoutMs: undefined },
      { GRIDPLAN_LOG_LEVEL: 'debug', GRIDPLAN_FACADE_TIMEOUT_MS: '100' }
    );

    expect(config.logLevel).toBe(LogLevel.ERROR);
    expect(config.facadeTimeoutMs).toBe(100);
  });

  it('rejects invalid environment values', () => {
    expect(() => loadConfig({}, { GRIDPLAN_LOG_LEVEL: 'loud' })).toThrow('Invalid engine config "logLevel"');
    expect(() => loadConfig({}, { GRIDPLAN_FACADE_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid engine config "facadeTimeoutMs"'
    );
  });
});
