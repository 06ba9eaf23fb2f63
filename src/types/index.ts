// Saved GitHub identity
export interface Credential {
  username: string; // canonical GitHub login
  email: string; // email used for git commits
  token: string; // personal access token
}

// Where a credential file lives
export type CredentialScope = 'local' | 'global';

// A credential together with the file it was read from
export interface StoredCredential {
  credential: Credential;
  scope: CredentialScope;
  path: string;
}

// Git actions the inspector can suggest
export type RepoAction = 'init' | 'add-remote' | 'commit' | 'push';

// Actions that are always available in the menu
export type SessionAction = 'status' | 'switch-account' | 'reset' | 'exit';

export type MenuChoice = RepoAction | SessionAction;

// Outcome of a single git invocation
export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type Tone = 'plain' | 'info' | 'success' | 'warn' | 'error';

export interface Choice<T extends string> {
  name: string;
  value: T;
}

// Everything the workflow needs from the terminal
export interface TerminalUI {
  display(message: string, tone?: Tone): void;
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  ask(question: string, defaultValue?: string): Promise<string>;
  secret(question: string): Promise<string>;
  select<T extends string>(question: string, choices: Choice<T>[]): Promise<T>;
}

export interface Settings {
  githubApiUrl: string;
  httpTimeoutMs: number;
  gitTimeoutMs: number;
  maxAuthAttempts: number;
  configFileName: string;
  defaultBranch: string;
  defaultCommitMessage: string;
}
