import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: '0.0.0.0',
      logLevel: 'info',
      nodeEnv: 'development',
      corsOrigin: true,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({ PORT: '8080', HOST: '127.0.0.1', LOG_LEVEL: 'debug', NODE_ENV: 'production' });
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.logLevel).toBe('debug');
    expect(config.nodeEnv).toBe('production');
  });

  it('splits a comma-separated origin list', () => {
    const config = loadConfig({ CORS_ORIGIN: 'https://a.example.com, https://b.example.com,' });
    expect(config.corsOrigin).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
