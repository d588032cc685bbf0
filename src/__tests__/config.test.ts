import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config/env.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      port: 8000,
      host: '0.0.0.0',
      nodeEnv: 'development',
      logLevel: 'info',
      logFile: undefined,
      corsOrigins: []
    });
    expect(path.basename(config.staticDir)).toBe('static');
  });

  it('reads and normalises overrides', () => {
    const config = loadConfig({
      PORT: '3001',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      LOG_FILE: 'logs/server.log',
      STATIC_DIR: 'public',
      CORS_ORIGINS: ' http://localhost:3000 , ,http://localhost:8000'
    });

    expect(config.port).toBe(3001);
    expect(config.nodeEnv).toBe('production');
    expect(config.logLevel).toBe('debug');
    expect(config.logFile).toBe('logs/server.log');
    expect(config.staticDir).toBe(path.resolve('public'));
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:8000']);
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'eighty', LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment configuration: PORT: .*, LOG_LEVEL: /);
  });
});
