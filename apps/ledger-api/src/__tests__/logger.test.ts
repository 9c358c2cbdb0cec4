import { describe, it, expect, afterEach } from 'vitest';
import { applyLoggerConfig, logger, resolveLevel } from '../logger.js';
import { loadConfig, ConfigError } from '../config.js';

describe('Logger', () => {
  afterEach(() => {
    logger.level = 'silent';
  });

  it('starts silent under test', () => {
    expect(logger.level).toBe('silent');
  });

  it('falls back to info for an unknown startup level', () => {
    expect(resolveLevel('verbose')).toBe('info');
    expect(resolveLevel(undefined)).toBe('info');
    expect(resolveLevel('debug')).toBe('debug');
  });

  it('applies the level from the parsed config', () => {
    applyLoggerConfig(loadConfig({ LOG_LEVEL: 'warn' }));
    expect(logger.level).toBe('warn');
  });

  it('keeps test runs silent whatever the configured level', () => {
    applyLoggerConfig(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'trace' }));
    expect(logger.level).toBe('silent');
  });

  it('reports an unknown LOG_LEVEL as a config error', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
