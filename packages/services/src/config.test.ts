import { describe, expect, it } from 'vitest';

import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 4000,
      host: '0.0.0.0',
      logLevel: 'info',
      gridSize: 30,
      maxSessions: 64
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({ PORT: '8080', LOG_LEVEL: 'debug', GRID_SIZE: '12', MAX_SESSIONS: '3' });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.gridSize).toBe(12);
    expect(config.maxSessions).toBe(3);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ GRID_SIZE: '1' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => loadConfig({ PORT: 'abc' })).toThrow();
  });
});
