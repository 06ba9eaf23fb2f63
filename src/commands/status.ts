import { TerminalUI } from '../types';
import { CredentialStore } from '../utils/config';
import { exitWithError } from '../utils/errors';
import { describeCredential } from './start';

/**
 * `gitput status` command handler: print the saved identity
 */
export function status(store: CredentialStore, ui: TerminalUI): void {
  try {
    ui.display(describeCredential(store.load()), 'info');
  } catch (error) {
    exitWithError(ui, error);
  }
}
