import { describe, it, expect, afterEach, vi } from 'vitest';
import { join } from 'path';
import { config, configProblems } from './config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('config', () => {
  it('falls back to defaults', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('HOST', '');
    vi.stubEnv('CATALOG_FILE', '');
    vi.stubEnv('LOG_REQUESTS', '');
    expect(config.PORT).toBe(8000);
    expect(config.HOST).toBe('0.0.0.0');
    expect(config.CATALOG_FILE).toBe(join(process.cwd(), 'data', 'activities.json'));
    expect(config.LOG_REQUESTS).toBe(true);
  });

  it('reads values from the environment on every access', () => {
    vi.stubEnv('PORT', '3000');
    vi.stubEnv('LOG_REQUESTS', 'false');
    expect(config.PORT).toBe(3000);
    expect(config.LOG_REQUESTS).toBe(false);
  });
});

describe('configProblems', () => {
  it('accepts the defaults', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('HOST', '');
    expect(configProblems()).toEqual([]);
  });

  it('rejects a non-numeric port', () => {
    vi.stubEnv('PORT', 'http');
    expect(configProblems()).toEqual(['PORT must be an integer between 0 and 65535 (got "http")']);
  });

  it('rejects an out-of-range port', () => {
    vi.stubEnv('PORT', '70000');
    expect(configProblems()).toEqual(['PORT must be an integer between 0 and 65535 (got "70000")']);
  });

  it('rejects a blank host', () => {
    vi.stubEnv('PORT', '');
    vi.stubEnv('HOST', '   ');
    expect(configProblems()).toEqual(['HOST must not be blank']);
  });
});
