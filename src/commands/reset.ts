import { TerminalUI } from '../types';
import { CredentialStore } from '../utils/config';
import { exitWithError } from '../utils/errors';

/**
 * `gitput reset` command handler: delete the saved credentials
 * @param store credential store for the current directory
 * @param ui terminal output
 */
export function reset(store: CredentialStore, ui: TerminalUI): void {
  try {
    const scope = store.reset();
    if (!scope) {
      ui.display('No saved credentials to remove.', 'warn');
      return;
    }
    ui.display(`🗑️  Removed ${scope} credentials (${store.pathFor(scope)})`, 'success');
  } catch (error) {
    exitWithError(ui, error);
  }
}
