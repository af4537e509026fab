import { describe, it, expect } from 'vitest';
import { MISSING_OPENAI_KEY, getOpenAIKey, getUsers, loadConfig, parseUsers } from './config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(5000);
    expect(config.NODE_ENV).toBe('development');
    expect(config.TRIPS_DATA_FILE).toBe('saved_trips.json');
    expect(config.AI_PLANNER_MODEL).toBe('gpt-4o');
    expect(config.OPENAI_API_KEY).toBeUndefined();
  });

  it('coerces the port and treats blank values as unset', () => {
    const config = loadConfig({ PORT: '8080', OPENAI_API_KEY: '  ', TRIPS_DATA_FILE: '' });

    expect(config.PORT).toBe(8080);
    expect(config.OPENAI_API_KEY).toBeUndefined();
    expect(config.TRIPS_DATA_FILE).toBe('saved_trips.json');
  });

  it('reads the in-memory store flag as a boolean', () => {
    expect(loadConfig({}).USE_IN_MEMORY_STORE).toBe(false);
    expect(loadConfig({ USE_IN_MEMORY_STORE: '1' }).USE_IN_MEMORY_STORE).toBe(true);
    expect(loadConfig({ USE_IN_MEMORY_STORE: 'false' }).USE_IN_MEMORY_STORE).toBe(false);
  });

  it('rejects a malformed base URL', () => {
    expect(() => loadConfig({ OPENAI_BASE_URL: 'not a url' })).toThrow();
  });
});

describe('parseUsers', () => {
  it('reports a missing setting', () => {
    expect(parseUsers(undefined)).toEqual({
      ok: false,
      error: 'No USERS configuration found. Set USERS in the environment or .env file.',
    });
  });

  it('reads a JSON object and stringifies numeric passwords', () => {
    expect(parseUsers('{"alex": "test-secret", "sam": 1234}')).toEqual({
      ok: true,
      value: { alex: 'test-secret', sam: '1234' },
    });
  });

  it('reads comma-separated name:password pairs', () => {
    expect(parseUsers('alex:test-secret, sam:pass:word')).toEqual({
      ok: true,
      value: { alex: 'test-secret', sam: 'pass:word' },
    });
  });

  it('never offers the OPENAI_API_KEY entry as a login', () => {
    expect(parseUsers('alex:test-secret,OPENAI_API_KEY:test-key')).toEqual({
      ok: true,
      value: { alex: 'test-secret' },
    });
  });

  it('reports a pair without a separator', () => {
    expect(parseUsers('alex')).toEqual({
      ok: false,
      error: 'USERS entry "alex" is not in name:password form.',
    });
  });

  it('reports invalid JSON', () => {
    const result = parseUsers('{alex: test-secret}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^USERS is not valid JSON\. Details: /);
    }
  });

  it('reports JSON that is not a name-to-password map', () => {
    expect(parseUsers('{"alex": true}')).toEqual({
      ok: false,
      error: 'USERS must map usernames to passwords.',
    });
  });
});

describe('getUsers', () => {
  it('reads USERS from the given config', () => {
    expect(getUsers(loadConfig({ USERS: 'alex:test-secret' }))).toEqual({
      ok: true,
      value: { alex: 'test-secret' },
    });
  });
});

describe('getOpenAIKey', () => {
  it('returns the key when set', () => {
    expect(getOpenAIKey(loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toEqual({
      ok: true,
      value: 'test-secret',
    });
  });

  it('falls back to an OPENAI_API_KEY entry in USERS', () => {
    const config = loadConfig({ USERS: '{"alex": "test-secret", "OPENAI_API_KEY": "test-key"}' });

    expect(getOpenAIKey(config)).toEqual({ ok: true, value: 'test-key' });
  });

  it('prefers the top-level key over the USERS entry', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'top-key', USERS: 'alex:test-secret,OPENAI_API_KEY:nested-key' });

    expect(getOpenAIKey(config)).toEqual({ ok: true, value: 'top-key' });
  });

  it('explains how to set a missing key', () => {
    expect(getOpenAIKey(loadConfig({ USERS: 'alex:test-secret' }))).toEqual({
      ok: false,
      error: MISSING_OPENAI_KEY,
    });
  });
});
