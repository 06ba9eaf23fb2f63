import { Settings } from './types';
import { CredentialStore, resolveCredentialPaths } from './utils/config';
import { GitHubClient } from './utils/github';
import { ExecaGitRunner, GitRunner } from './utils/git';

export interface AppContext {
  cwd: string;
  settings: Settings;
  store: CredentialStore;
  github: GitHubClient;
  git: GitRunner;
}

/**
 * Wire the collaborators for one project directory
 * @param cwd project directory
 * @param home user home directory
 * @param settings runtime settings
 */
export function createContext(cwd: string, home: string, settings: Settings): AppContext {
  return {
    cwd,
    settings,
    store: new CredentialStore(resolveCredentialPaths(cwd, home, settings.configFileName)),
    github: new GitHubClient({ baseURL: settings.githubApiUrl, timeoutMs: settings.httpTimeoutMs }),
    git: new ExecaGitRunner(cwd, settings.gitTimeoutMs),
  };
}
