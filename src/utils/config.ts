import fs from 'fs-extra';
import path from 'path';
import { Credential, CredentialScope, StoredCredential } from '../types';
import { ConfigReadError, CredentialError } from './errors';

export interface CredentialPaths {
  local: string;
  global: string;
}

// Lookup order for load() and reset()
const SCOPE_PRECEDENCE: CredentialScope[] = ['local', 'global'];

/**
 * Build the project-local and user-global credential file paths
 * @param cwd project directory
 * @param home user home directory
 * @param fileName credential file name
 */
export function resolveCredentialPaths(cwd: string, home: string, fileName: string): CredentialPaths {
  return {
    local: path.join(cwd, fileName),
    global: path.join(home, fileName),
  };
}

function nonEmpty(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function isCredential(value: unknown): value is Credential {
  if (typeof value !== 'object' || value === null) return false;
  if (!('username' in value) || !('email' in value) || !('token' in value)) return false;
  return nonEmpty(value.username) && nonEmpty(value.email) && nonEmpty(value.token);
}

function readCredentialFile(filePath: string): Credential | ConfigReadError {
  let data: unknown;
  try {
    data = fs.readJsonSync(filePath);
  } catch (error) {
    return new ConfigReadError(filePath, error);
  }
  return isCredential(data) ? data : new ConfigReadError(filePath);
}

/**
 * Reads and writes the saved GitHub identity.
 */
export class CredentialStore {
  constructor(private readonly paths: CredentialPaths) {}

  pathFor(scope: CredentialScope): string {
    return this.paths[scope];
  }

  exists(scope: CredentialScope): boolean {
    return fs.existsSync(this.paths[scope]);
  }

  /**
   * Load the credential, preferring the local file over the global one.
   * A missing file counts as absent. A corrupt one throws ConfigReadError,
   * unless `onCorrupt` is given: then it is reported and skipped.
   * @param onCorrupt receives each corrupt file passed over
   */
  load(onCorrupt?: (error: ConfigReadError) => void): StoredCredential | null {
    for (const scope of SCOPE_PRECEDENCE) {
      const filePath = this.paths[scope];
      if (!fs.existsSync(filePath)) continue;

      const data = readCredentialFile(filePath);
      if (data instanceof ConfigReadError) {
        if (!onCorrupt) throw data;
        onCorrupt(data);
        continue;
      }

      return {
        credential: { username: data.username, email: data.email, token: data.token },
        scope,
        path: filePath,
      };
    }

    return null;
  }

  /**
   * Write the credential at one scope. Files at scopes that load() checks
   * first are removed, so the next load() returns this credential.
   * @returns path written
   */
  save(credential: Credential, scope: CredentialScope): string {
    if (!isCredential(credential)) {
      throw new CredentialError('Username, email and token must all be non-empty');
    }

    const filePath = this.paths[scope];
    fs.outputJsonSync(filePath, { username: credential.username, email: credential.email, token: credential.token }, { spaces: 2 });

    for (const shadowing of SCOPE_PRECEDENCE.slice(0, SCOPE_PRECEDENCE.indexOf(scope))) {
      fs.removeSync(this.paths[shadowing]);
    }
    return filePath;
  }

  /**
   * Delete the file load() would read, corrupt or not
   * @returns the scope removed, or null when nothing was saved
   */
  reset(): CredentialScope | null {
    for (const scope of SCOPE_PRECEDENCE) {
      if (this.exists(scope)) {
        fs.removeSync(this.paths[scope]);
        return scope;
      }
    }
    return null;
  }
}

/**
 * Hide all but the last four characters of a token
 */
export function maskToken(token: string): string {
  if (token.length <= 4) return '*'.repeat(token.length);
  return `${'*'.repeat(token.length - 4)}${token.slice(-4)}`;
}
