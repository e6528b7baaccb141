import { parseConfig, parseTermList } from './config.js';
import { ConfigError } from './errors.js';
import { LogLevel } from './logger.js';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(parseConfig({})).toEqual({
      dbPath: 'registry.db',
      exportDir: 'exports',
      graduationTerms: ['2024-07', '2025-02'],
      logLevel: LogLevel.INFO,
      logToFile: false,
      logDir: 'logs',
    });
  });

  it('reads values from the environment', () => {
    const config = parseConfig({
      REGISTRY_DB_PATH: '/tmp/test.db',
      EXPORT_DIR: 'out',
      GRADUATION_TERMS: ' 2025-07 , ,2026-02',
      LOG_LEVEL: 'WARN',
      LOG_TO_FILE: 'true',
      LOG_DIR: 'var/log',
    });

    expect(config.dbPath).toBe('/tmp/test.db');
    expect(config.exportDir).toBe('out');
    expect(config.graduationTerms).toEqual(['2025-07', '2026-02']);
    expect(config.logLevel).toBe(LogLevel.WARN);
    expect(config.logToFile).toBe(true);
    expect(config.logDir).toBe('var/log');
  });

  it('forces DEBUG when REGISTRY_DEBUG is set', () => {
    expect(parseConfig({ REGISTRY_DEBUG: 'true', LOG_LEVEL: 'error' }).logLevel).toBe(LogLevel.DEBUG);
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => parseConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid environment variable LOG_LEVEL: "loud"');
  });

  it('rejects a malformed flag', () => {
    expect(() => parseConfig({ LOG_TO_FILE: 'yes' })).toThrow('Invalid environment variable LOG_TO_FILE');
  });
});

describe('parseTermList', () => {
  it('returns an empty list for an empty string', () => {
    expect(parseTermList('')).toEqual([]);
  });
});
