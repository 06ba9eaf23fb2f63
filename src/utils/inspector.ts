import { RepoAction } from '../types';
import { GitRunner, isGitRepo } from './git';

// Trimmed stdout, or '' when the command itself failed
async function readOutput(runner: GitRunner, args: string[]): Promise<string> {
  const { exitCode, stdout } = await runner.run(args);
  return exitCode === 0 ? stdout.trim() : '';
}

/**
 * Work out which git actions make sense right now.
 *
 * Outside a work tree only `init` is offered. Inside one, each action is
 * decided on its own:
 * - `add-remote` when no remote is configured
 * - `commit` when the working tree has changes
 * - `push` when any remote-tracking history exists. Before the first push
 *   there is none, so `push` stays hidden until then.
 *
 * Nothing is cached; every call queries the repository again.
 * @param runner git runner for the project directory
 * @returns applicable actions in menu order
 */
export async function inspectRepository(runner: GitRunner): Promise<RepoAction[]> {
  if (!(await isGitRepo(runner))) {
    return ['init'];
  }

  const actions: RepoAction[] = [];

  if ((await readOutput(runner, ['remote', '-v'])) === '') {
    actions.push('add-remote');
  }
  if ((await readOutput(runner, ['status', '--porcelain'])) !== '') {
    actions.push('commit');
  }
  if ((await readOutput(runner, ['log', '--remotes', '--pretty=oneline'])) !== '') {
    actions.push('push');
  }

  return actions;
}
