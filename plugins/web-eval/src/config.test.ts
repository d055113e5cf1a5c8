import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_BACKEND_URL, DEFAULT_MODEL, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      backendUrl: DEFAULT_BACKEND_URL,
      logPort: 5009,
      openDashboard: true,
      headless: false,
      maxSteps: 25,
      model: DEFAULT_MODEL,
      chromePath: undefined,
    });
  });

  it('reads and normalizes overrides', () => {
    const config = loadConfig({
      OPERATIVE_API_KEY: ' test-key ',
      OPERATIVE_BACKEND_URL: 'http://localhost:8000/',
      WEB_EVAL_LOG_PORT: '0',
      WEB_EVAL_OPEN_DASHBOARD: '0',
      WEB_EVAL_HEADLESS: 'YES',
      WEB_EVAL_MAX_STEPS: '5',
      WEB_EVAL_MODEL: 'claude-test',
      CHROME_PATH: '/opt/chrome/chrome',
    });

    expect(config).toEqual({
      apiKey: 'test-key',
      backendUrl: 'http://localhost:8000',
      logPort: 0,
      openDashboard: false,
      headless: true,
      maxSteps: 5,
      model: 'claude-test',
      chromePath: '/opt/chrome/chrome',
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ OPERATIVE_API_KEY: '   ', WEB_EVAL_LOG_PORT: '', WEB_EVAL_HEADLESS: '' });
    expect(config.apiKey).toBeUndefined();
    expect(config.logPort).toBe(5009);
    expect(config.headless).toBe(false);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ WEB_EVAL_LOG_PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ WEB_EVAL_LOG_PORT: 'abc' })).toThrow(/WEB_EVAL_LOG_PORT/);
  });

  it('rejects an unknown boolean spelling', () => {
    expect(() => loadConfig({ WEB_EVAL_HEADLESS: 'maybe' })).toThrow(/WEB_EVAL_HEADLESS/);
  });

  it('rejects a backend URL that is not a URL', () => {
    expect(() => loadConfig({ OPERATIVE_BACKEND_URL: 'not a url' })).toThrow(/OPERATIVE_BACKEND_URL/);
  });
});
