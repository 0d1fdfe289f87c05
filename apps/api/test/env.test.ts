import { describe, it, expect } from 'vitest';
import { DEFAULT_PLANNER_CONFIG_PATH, GOOGLE_MAPS_API_BASE, loadEnv } from '../src/config/env';
import { ConfigurationError } from '../src/errors';

describe('loadEnv', () => {
  it('fills defaults around the API key', () => {
    expect(loadEnv({ GOOGLE_MAPS_API_KEY: 'test-secret' })).toEqual({
      GOOGLE_MAPS_API_KEY: 'test-secret',
      GOOGLE_MAPS_API_BASE,
      PLANNER_CONFIG: DEFAULT_PLANNER_CONFIG_PATH,
      JOURNEY_EXPORT_PATH: 'journey_scenarios.csv',
      TRAVEL_FALLBACK_MINUTES: 60,
      LOG_LEVEL: 'info',
      PORT: 4000,
    });
  });

  it('coerces numeric settings', () => {
    const env = loadEnv({ GOOGLE_MAPS_API_KEY: 'test-secret', TRAVEL_FALLBACK_MINUTES: '45', PORT: '8080' });

    expect(env.TRAVEL_FALLBACK_MINUTES).toBe(45);
    expect(env.PORT).toBe(8080);
  });

  it('treats blank numeric settings as unset', () => {
    const env = loadEnv({ GOOGLE_MAPS_API_KEY: 'test-secret', TRAVEL_FALLBACK_MINUTES: '', PORT: ' ' });

    expect(env.TRAVEL_FALLBACK_MINUTES).toBe(60);
    expect(env.PORT).toBe(4000);
  });

  it('fails without an API key', () => {
    expect(() => loadEnv({})).toThrow(new ConfigurationError('GOOGLE_MAPS_API_KEY is not configured'));
    expect(() => loadEnv({ GOOGLE_MAPS_API_KEY: '  ' })).toThrow('GOOGLE_MAPS_API_KEY is not configured');
  });

  it('lists invalid settings', () => {
    let error: unknown;
    try {
      loadEnv({ GOOGLE_MAPS_API_KEY: 'test-secret', LOG_LEVEL: 'loud' });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.problems).toHaveLength(1);
    expect(error.problems[0].startsWith('LOG_LEVEL: ')).toBe(true);
    expect(error.message.startsWith('Invalid environment:\n  - LOG_LEVEL: ')).toBe(true);
  });
});
