import execa from 'execa';
import { GitResult } from '../types';
import { EnvironmentError, GitCommandError } from './errors';

/**
 * Runs git subcommands. A non-zero exit is reported, never thrown.
 */
export interface GitRunner {
  run(args: string[]): Promise<GitResult>;
}

/**
 * GitRunner backed by the git binary on PATH
 */
export class ExecaGitRunner implements GitRunner {
  constructor(private readonly cwd: string, private readonly timeoutMs: number) {}

  async run(args: string[]): Promise<GitResult> {
    const result = await execa('git', args, {
      cwd: this.cwd,
      reject: false,
      timeout: this.timeoutMs,
    });

    const stderr = result.timedOut ? `${result.stderr}\ngit ${args.join(' ')} timed out after ${this.timeoutMs / 1000}s`.trim() : result.stderr;

    return {
      // undefined when git could not be spawned at all
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr,
    };
  }
}

/**
 * Make sure a git binary can be executed
 */
export async function ensureGitAvailable(): Promise<string> {
  try {
    const { stdout } = await execa('git', ['--version']);
    return stdout.trim();
  } catch (error) {
    throw new EnvironmentError('git was not found. Install Git and make sure it is on your PATH.');
  }
}

/**
 * Run a git subcommand and throw GitCommandError on a non-zero exit
 * @param runner git runner
 * @param args git arguments
 * @returns stdout of the command
 */
export async function runOrThrow(runner: GitRunner, args: string[]): Promise<string> {
  const result = await runner.run(args);
  if (result.exitCode !== 0) {
    throw new GitCommandError(args, result.exitCode, result.stderr || result.stdout);
  }
  return result.stdout;
}

/**
 * Check whether the runner's directory is inside a work tree
 */
export async function isGitRepo(runner: GitRunner): Promise<boolean> {
  const { exitCode } = await runner.run(['rev-parse', '--is-inside-work-tree']);
  return exitCode === 0;
}

/**
 * Check whether a remote with the given name is configured
 * @param runner git runner
 * @param remoteName remote name
 */
export async function checkRemoteExists(runner: GitRunner, remoteName: string): Promise<boolean> {
  const { exitCode, stdout } = await runner.run(['remote']);
  if (exitCode !== 0) return false;
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .includes(remoteName);
}

export async function initGitRepo(runner: GitRunner): Promise<void> {
  await runOrThrow(runner, ['init']);
}

/**
 * Set the global commit identity
 * @param runner git runner
 * @param username user.name
 * @param email user.email
 */
export async function setGlobalIdentity(runner: GitRunner, username: string, email: string): Promise<void> {
  await runOrThrow(runner, ['config', '--global', 'user.name', username]);
  await runOrThrow(runner, ['config', '--global', 'user.email', email]);
}

export async function hasUncommittedChanges(runner: GitRunner): Promise<boolean> {
  const { exitCode, stdout } = await runner.run(['status', '--porcelain']);
  return exitCode === 0 && stdout.trim() !== '';
}

/**
 * Stage everything and commit
 * @param runner git runner
 * @param message commit message
 */
export async function commitAll(runner: GitRunner, message: string): Promise<void> {
  await runOrThrow(runner, ['add', '.']);
  await runOrThrow(runner, ['commit', '-m', message]);
}

/**
 * Rename the current branch and push it with upstream tracking
 * @param runner git runner
 * @param branch branch name on both sides
 */
export async function pushToRemote(runner: GitRunner, branch: string): Promise<string> {
  await runOrThrow(runner, ['branch', '-M', branch]);
  const result = await runner.run(['push', '-u', 'origin', branch]);
  if (result.exitCode !== 0) {
    throw new GitCommandError(['push', '-u', 'origin', branch], result.exitCode, result.stderr);
  }
  // git reports push progress on stderr
  return result.stderr.trim() || result.stdout.trim();
}
