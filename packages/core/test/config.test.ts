import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../src/constants/defaults.js';
import { cfg, configSchema } from '../src/utils/config.js';

describe('Configuration System', () => {
  it('should load config with default values', () => {
    expect(cfg).toBeDefined();
    expect(cfg.NODE_ENV).toBe('test'); // vitest sets NODE_ENV to 'test'
    expect(cfg.TREE_MAX_DEPTH_WARNING).toBe(DEFAULT_CONFIG.VALIDATION.MAX_DEPTH_WARNING);
    expect(typeof cfg.CLI_MODE).toBe('boolean');
  });

  it('should validate enum values', () => {
    expect(['development', 'production', 'test']).toContain(cfg.NODE_ENV);
    expect(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).toContain(cfg.LOG_LEVEL);
  });

  it('should apply schema defaults to an empty environment', () => {
    expect(configSchema.parse({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      CLI_MODE: false,
      TREE_MAX_DEPTH_WARNING: 64,
    });
  });

  it('should coerce values read from the environment', () => {
    const parsed = configSchema.parse({ TREE_MAX_DEPTH_WARNING: '12', CLI_MODE: '1' });

    expect(parsed.TREE_MAX_DEPTH_WARNING).toBe(12);
    expect(parsed.CLI_MODE).toBe(true);
  });

  it('should read CLI_MODE strings literally', () => {
    expect(configSchema.parse({ CLI_MODE: 'false' }).CLI_MODE).toBe(false);
    expect(configSchema.parse({ CLI_MODE: '0' }).CLI_MODE).toBe(false);
    expect(configSchema.parse({ CLI_MODE: 'true' }).CLI_MODE).toBe(true);
    expect(configSchema.parse({ CLI_MODE: true }).CLI_MODE).toBe(true);
    expect(() => configSchema.parse({ CLI_MODE: 'yes' })).toThrow();
  });

  it('should reject invalid depth limits', () => {
    expect(() => configSchema.parse({ TREE_MAX_DEPTH_WARNING: '0' })).toThrow();
    expect(() => configSchema.parse({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
