import path from 'path';
import { Choice, MenuChoice, StoredCredential, TerminalUI } from '../types';
import { maskToken } from '../utils/config';
import { describeError, EnvironmentError, exitWithError } from '../utils/errors';
import { checkRemoteExists, commitAll, ensureGitAvailable, hasUncommittedChanges, initGitRepo, isGitRepo, pushToRemote, runOrThrow } from '../utils/git';
import { inspectRepository } from '../utils/inspector';
import { AppContext } from '../context';
import { AuthDeps, authenticate, configureIdentity, promptForCredential, saveCredential } from './auth';

export interface WorkflowDeps extends AppContext {
  ui: TerminalUI;
}

export type WorkflowState = 'AUTH' | 'MENU' | 'CONNECTING' | 'COMMITTING' | 'PUSHING' | 'DONE';

const ACTION_LABELS: Record<MenuChoice, string> = {
  init: 'Initialize a Git repository here',
  'add-remote': 'Connect a GitHub repository',
  commit: 'Commit changes',
  push: 'Push to GitHub',
  status: 'Show saved account',
  'switch-account': 'Switch GitHub account',
  reset: 'Forget saved credentials',
  exit: 'Exit',
};

const SESSION_ACTIONS: MenuChoice[] = ['status', 'switch-account', 'reset', 'exit'];

type ConnectMode = 'create' | 'existing';

/**
 * One interactive session: authenticate, then offer whatever git actions
 * the repository currently allows until the user leaves.
 */
export class Workflow {
  private state: WorkflowState = 'AUTH';
  private session: StoredCredential | null = null;

  constructor(private readonly deps: WorkflowDeps) {}

  get currentState(): WorkflowState {
    return this.state;
  }

  async run(): Promise<void> {
    while (this.state !== 'DONE') {
      if (this.state === 'AUTH') {
        // Exhausted authentication ends the session
        this.session = await authenticate(this.authDeps());
        this.state = 'MENU';
        continue;
      }

      const choice = await this.promptMenu();
      try {
        await this.dispatch(choice);
      } catch (error) {
        // A failed action returns to the menu; a missing git does not
        if (error instanceof EnvironmentError) throw error;
        this.deps.ui.display(`❌ ${describeError(error)}`, 'error');
      }
      if (!this.isDone()) {
        this.state = 'MENU';
      }
    }
  }

  private isDone(): boolean {
    return this.state === 'DONE';
  }

  /**
   * Offer the applicable repository actions followed by session actions
   */
  async promptMenu(): Promise<MenuChoice> {
    const actions = await inspectRepository(this.deps.git);
    const choices: Choice<MenuChoice>[] = [...actions, ...SESSION_ACTIONS].map((value) => ({ name: ACTION_LABELS[value], value }));
    return this.deps.ui.select('What do you want to do?', choices);
  }

  async dispatch(choice: MenuChoice): Promise<void> {
    switch (choice) {
      case 'init':
        return this.initRepository();
      case 'add-remote':
        this.state = 'CONNECTING';
        return this.connect();
      case 'commit':
        this.state = 'COMMITTING';
        return this.commit();
      case 'push':
        this.state = 'PUSHING';
        return this.push();
      case 'status':
        return this.showStatus();
      case 'switch-account':
        return this.switchAccount();
      case 'reset':
        return this.reset();
      case 'exit':
        this.state = 'DONE';
        this.deps.ui.display('👋 Bye!', 'info');
        return;
    }
  }

  private async initRepository(): Promise<void> {
    await initGitRepo(this.deps.git);
    this.deps.ui.display('Git repository initialized', 'success');
  }

  private async connect(): Promise<void> {
    const { ui, github, cwd } = this.deps;
    const mode = await ui.select<ConnectMode>('How do you want to connect?', [
      { name: 'Create a NEW repository on GitHub', value: 'create' },
      { name: 'Connect an EXISTING repository', value: 'existing' },
    ]);

    if (mode === 'existing') {
      const url = await ui.ask('Repository URL:');
      await this.reconcileRemote(url);
      return;
    }

    const { credential } = this.requireSession();
    const name = await ui.ask('Repository name:', path.basename(cwd));
    const isPrivate = await ui.confirm('Should the repository be private?', true);

    ui.display(`Creating ${credential.username}/${name} on GitHub...`, 'info');
    const cloneUrl = await github.createRepository(credential.username, credential.token, name, isPrivate);
    ui.display(`🎉 Repository created: ${cloneUrl}`, 'success');

    await this.reconcileRemote(cloneUrl);
  }

  /**
   * Point `origin` at a URL. An existing origin is only replaced after
   * the user agrees to remove it.
   * @param url remote URL
   * @returns whether the remote was added
   */
  async reconcileRemote(url: string): Promise<boolean> {
    const { ui, git } = this.deps;

    if (!(await isGitRepo(git))) {
      ui.display('Not a git repository. Initializing...', 'warn');
      await initGitRepo(git);
    }

    if (await checkRemoteExists(git, 'origin')) {
      const remove = await ui.confirm("Remote 'origin' already exists. Remove it?", false);
      if (!remove) {
        ui.display('Kept the existing remote.', 'warn');
        return false;
      }
      const removed = await git.run(['remote', 'remove', 'origin']);
      if (removed.exitCode === 0) {
        ui.display('Removed old remote.', 'warn');
      }
    }

    await runOrThrow(git, ['remote', 'add', 'origin', url]);
    ui.display(`✅ Added remote: ${url}`, 'success');
    return true;
  }

  private async commit(): Promise<void> {
    const { ui, git, settings } = this.deps;

    if (!(await hasUncommittedChanges(git))) {
      ui.display('Nothing to commit, working tree clean.', 'info');
      return;
    }

    const message = await ui.ask('Commit message:', settings.defaultCommitMessage);
    await commitAll(git, message);
    ui.display(`Committed: ${message}`, 'success');
  }

  private async push(): Promise<void> {
    const { ui, git, settings } = this.deps;
    ui.display(`🚀 Pushing to origin/${settings.defaultBranch}...`, 'info');
    const output = await pushToRemote(git, settings.defaultBranch);
    if (output) ui.display(output);
    ui.display('Pushed to GitHub', 'success');
  }

  private showStatus(): void {
    this.deps.ui.display(describeCredential(this.session));
  }

  private async switchAccount(): Promise<void> {
    const deps = this.authDeps();
    const credential = await promptForCredential(deps);
    this.session = await saveCredential(deps, credential);
    await configureIdentity(deps, credential);
  }

  private async reset(): Promise<void> {
    const { ui, store } = this.deps;
    const confirmed = await ui.confirm('Delete saved credentials and end this session?', false);
    if (!confirmed) return;

    const scope = store.reset();
    ui.display(scope ? `Removed ${scope} credentials.` : 'No saved credentials to remove.', 'success');
    this.session = null;
    this.state = 'DONE';
  }

  private requireSession(): StoredCredential {
    if (!this.session) {
      throw new Error('No authenticated session');
    }
    return this.session;
  }

  private authDeps(): AuthDeps {
    const { ui, store, github, git, settings } = this.deps;
    return { ui, store, github, git, maxAttempts: settings.maxAuthAttempts };
  }
}

/**
 * Human-readable summary of a saved credential
 */
export function describeCredential(stored: StoredCredential | null): string {
  if (!stored) {
    return 'No saved credentials.';
  }
  const { credential, scope, path: filePath } = stored;
  return [`👤 Username: ${credential.username}`, `📧 Email: ${credential.email}`, `🔑 Token: ${maskToken(credential.token)}`, `📁 Saved in: ${filePath} (${scope})`].join('\n');
}

/**
 * `gitput start` command handler
 * @param context collaborators for the current directory
 * @param ui terminal used for prompts and output
 */
export async function start(context: AppContext, ui: TerminalUI): Promise<void> {
  try {
    ui.display('👋 Welcome to GitPut, your Git assistant!\n', 'info');
    const version = await ensureGitAvailable();
    ui.display(`Using ${version}`);
    await new Workflow({ ...context, ui }).run();
  } catch (error) {
    exitWithError(ui, error);
  }
}
