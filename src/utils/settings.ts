import { Settings } from '../types';

export const DEFAULT_SETTINGS: Settings = {
  githubApiUrl: 'https://api.github.com',
  httpTimeoutMs: 10_000,
  gitTimeoutMs: 120_000,
  maxAuthAttempts: 3,
  configFileName: '.gitput_config.json',
  defaultBranch: 'main',
  defaultCommitMessage: 'Initial commit',
};

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Build runtime settings from environment variables
 * @param env usually process.env
 */
export function resolveSettings(env: NodeJS.ProcessEnv): Settings {
  return {
    ...DEFAULT_SETTINGS,
    githubApiUrl: env.GITPUT_GITHUB_API_URL?.trim() || DEFAULT_SETTINGS.githubApiUrl,
    httpTimeoutMs: positiveInt(env.GITPUT_HTTP_TIMEOUT_MS, DEFAULT_SETTINGS.httpTimeoutMs),
    gitTimeoutMs: positiveInt(env.GITPUT_GIT_TIMEOUT_MS, DEFAULT_SETTINGS.gitTimeoutMs),
    maxAuthAttempts: positiveInt(env.GITPUT_MAX_AUTH_ATTEMPTS, DEFAULT_SETTINGS.maxAuthAttempts),
  };
}
