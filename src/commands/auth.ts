import { Credential, StoredCredential, TerminalUI } from '../types';
import { CredentialStore } from '../utils/config';
import { AuthError, describeError, isRecoverable } from '../utils/errors';
import { GitHubClient } from '../utils/github';
import { GitRunner, setGlobalIdentity } from '../utils/git';

export interface AuthDeps {
  ui: TerminalUI;
  store: CredentialStore;
  github: GitHubClient;
  git: GitRunner;
  maxAttempts: number;
}

/**
 * Prompt until a token validates, at most `maxAttempts` times.
 * Nothing is written to disk here.
 * @returns credential carrying the login GitHub reported
 */
export async function promptForCredential(deps: AuthDeps, suggested?: Credential): Promise<Credential> {
  const { ui, github, maxAttempts } = deps;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const username = await ui.ask('GitHub username:', suggested?.username);
    const email = await ui.ask('GitHub email:', suggested?.email);
    const token = await ui.secret('GitHub personal access token:');

    try {
      ui.display('Validating token...', 'info');
      const login = await github.validateToken(token);
      if (login !== username) {
        ui.display(`GitHub reports this token belongs to "${login}"; using that username.`, 'warn');
      }
      return { username: login, email, token };
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      ui.display(`Authentication failed: ${describeError(error)} (attempt ${attempt}/${maxAttempts})`, 'error');
    }
  }

  throw new AuthError(`Authentication failed after ${maxAttempts} attempts`);
}

/**
 * Ask for a scope and persist a validated credential
 */
export async function saveCredential(deps: AuthDeps, credential: Credential): Promise<StoredCredential> {
  const local = await deps.ui.confirm('Save credentials for this project only? (No saves them for all projects)', false);
  const scope = local ? 'local' : 'global';
  const path = deps.store.save(credential, scope);
  deps.ui.display(`Credentials saved to ${path}`, 'success');
  return { credential, scope, path };
}

/**
 * Point git's global identity at the credential. Failure is only a warning.
 */
export async function configureIdentity(deps: AuthDeps, credential: Credential): Promise<void> {
  try {
    await setGlobalIdentity(deps.git, credential.username, credential.email);
    deps.ui.display(`Git identity set to ${credential.username} <${credential.email}>`, 'success');
  } catch (error) {
    if (!isRecoverable(error)) throw error;
    deps.ui.display(`Could not configure git identity: ${describeError(error)}`, 'warn');
  }
}

/**
 * Load the saved credential, or prompt for a new one and save it.
 * A corrupt credential file is reported and skipped.
 */
export async function authenticate(deps: AuthDeps): Promise<StoredCredential> {
  let stored = deps.store.load((error) => {
    deps.ui.display(`${error.message}. Ignoring it.`, 'warn');
  });

  if (stored) {
    deps.ui.display(`Logged in as ${stored.credential.username} (${stored.scope} credentials)`, 'success');
  } else {
    deps.ui.display('No saved credentials found. Let us connect your GitHub account.', 'info');
    const credential = await promptForCredential(deps);
    stored = await saveCredential(deps, credential);
  }

  await configureIdentity(deps, stored.credential);
  return stored;
}
