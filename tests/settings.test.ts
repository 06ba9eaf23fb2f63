import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, resolveSettings } from '../src/utils/settings';

describe('resolveSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS.httpTimeoutMs).toBe(10_000);
    expect(DEFAULT_SETTINGS.configFileName).toBe('.gitput_config.json');
  });

  it('reads overrides from the environment', () => {
    const settings = resolveSettings({
      GITPUT_GITHUB_API_URL: 'https://ghe.example.com/api/v3',
      GITPUT_HTTP_TIMEOUT_MS: '5000',
      GITPUT_GIT_TIMEOUT_MS: '30000',
      GITPUT_MAX_AUTH_ATTEMPTS: '5',
    });

    expect(settings).toMatchObject({
      githubApiUrl: 'https://ghe.example.com/api/v3',
      httpTimeoutMs: 5000,
      gitTimeoutMs: 30000,
      maxAuthAttempts: 5,
    });
  });

  it('ignores invalid numbers', () => {
    const settings = resolveSettings({ GITPUT_MAX_AUTH_ATTEMPTS: '0', GITPUT_HTTP_TIMEOUT_MS: 'soon' });
    expect(settings.maxAuthAttempts).toBe(3);
    expect(settings.httpTimeoutMs).toBe(10_000);
  });
});
