import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Choice, GitResult, TerminalUI, Tone } from '../src/types';
import { GitRunner } from '../src/utils/git';

// A function answer runs when its prompt is reached
type Answer = string | boolean | (() => string | boolean);

/**
 * Terminal that replays scripted answers. An empty string answer to
 * `ask` takes the default, as pressing enter would.
 */
export class ScriptedUI implements TerminalUI {
  readonly output: { message: string; tone: Tone }[] = [];
  readonly offered: { question: string; values: string[] }[] = [];

  constructor(private readonly answers: Answer[] = []) {}

  queue(...answers: Answer[]): void {
    this.answers.push(...answers);
  }

  get remaining(): number {
    return this.answers.length;
  }

  messages(tone?: Tone): string[] {
    return this.output.filter((entry) => tone === undefined || entry.tone === tone).map((entry) => entry.message);
  }

  display(message: string, tone: Tone = 'plain'): void {
    this.output.push({ message, tone });
  }

  async confirm(question: string): Promise<boolean> {
    const answer = this.next(question);
    if (typeof answer !== 'boolean') throw new Error(`Expected a yes/no answer for "${question}", got ${answer}`);
    return answer;
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const answer = this.text(question);
    return answer === '' && defaultValue !== undefined ? defaultValue : answer;
  }

  async secret(question: string): Promise<string> {
    return this.text(question);
  }

  menus(question = 'What do you want to do?'): string[][] {
    return this.offered.filter((entry) => entry.question === question).map((entry) => entry.values);
  }

  async select<T extends string>(question: string, choices: Choice<T>[]): Promise<T> {
    this.offered.push({ question, values: choices.map((choice) => choice.value) });
    const answer = this.text(question);
    const match = choices.find((choice) => choice.value === answer);
    if (!match) {
      throw new Error(`"${answer}" is not offered for "${question}" (offered: ${choices.map((c) => c.value).join(', ')})`);
    }
    return match.value;
  }

  private text(question: string): string {
    const answer = this.next(question);
    if (typeof answer !== 'string') throw new Error(`Expected a text answer for "${question}", got ${answer}`);
    return answer;
  }

  private next(question: string): Answer {
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`No scripted answer left for "${question}"`);
    return typeof answer === 'function' ? answer() : answer;
  }
}

const ok = (stdout = '', stderr = ''): GitResult => ({ exitCode: 0, stdout, stderr });
const fail = (exitCode: number, stderr: string, stdout = ''): GitResult => ({ exitCode, stdout, stderr });

/**
 * In-memory stand-in for a git working tree
 */
export class FakeGit implements GitRunner {
  readonly calls: string[][] = [];
  readonly remotes = new Map<string, string>();
  readonly config = new Map<string, string>();
  readonly commits: string[] = [];
  readonly failures = new Map<string, GitResult>();
  isRepo = false;
  changedFiles: string[] = [];
  remoteHistory = false;

  commands(): string[] {
    return this.calls.map((args) => args.join(' '));
  }

  async run(args: string[]): Promise<GitResult> {
    this.calls.push(args);
    const key = args.join(' ');

    const failure = this.failures.get(key);
    if (failure) return failure;

    const [command, ...rest] = args;

    if (command === 'init') {
      this.isRepo = true;
      return ok('Initialized empty Git repository');
    }
    if (command === 'config') {
      this.config.set(rest[1], rest[2]);
      return ok();
    }
    if (!this.isRepo) {
      return fail(128, 'fatal: not a git repository (or any of the parent directories): .git');
    }

    switch (key) {
      case 'rev-parse --is-inside-work-tree':
        return ok('true');
      case 'remote -v':
        return ok([...this.remotes].map(([name, url]) => `${name}\t${url} (fetch)\n${name}\t${url} (push)`).join('\n'));
      case 'remote':
        return ok([...this.remotes.keys()].join('\n'));
      case 'status --porcelain':
        return ok(this.changedFiles.map((file) => `?? ${file}`).join('\n'));
      case 'add .':
        return ok();
      case 'log --remotes --pretty=oneline':
        return ok(this.remoteHistory ? `4b825dc642cb6eb9a060e54bf8d69288fbee4904 ${this.commits[this.commits.length - 1]}` : '');
    }

    if (command === 'remote' && rest[0] === 'add') {
      if (this.remotes.has(rest[1])) return fail(3, `error: remote ${rest[1]} already exists.`);
      this.remotes.set(rest[1], rest[2]);
      return ok();
    }
    if (command === 'remote' && rest[0] === 'remove') {
      if (!this.remotes.delete(rest[1])) return fail(2, `error: No such remote: '${rest[1]}'`);
      return ok();
    }
    if (command === 'commit') {
      if (this.changedFiles.length === 0) return fail(1, '', 'nothing to commit, working tree clean');
      this.commits.push(rest[1]);
      this.changedFiles = [];
      return ok(`[main (root-commit) 4b825dc] ${rest[1]}`);
    }
    if (command === 'branch') {
      return ok();
    }
    if (command === 'push') {
      if (!this.remotes.has('origin')) {
        return fail(128, "fatal: 'origin' does not appear to be a git repository");
      }
      this.remoteHistory = true;
      return ok('', `To ${this.remotes.get('origin')}\n * [new branch]      main -> main`);
    }

    return fail(1, `unexpected git ${key}`);
  }
}

export interface RecordedRequest {
  method: string;
  url: string;
  baseURL: string;
  authorization: string;
  body: unknown;
}

type Reply = { status: number; data: unknown } | { error: AxiosError };

/**
 * axios instance whose adapter answers from a queue instead of the network
 */
export function stubHttp(replies: Reply[]): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push({
        method: String(config.method).toUpperCase(),
        url: String(config.url),
        baseURL: String(config.baseURL),
        authorization: String(config.headers.Authorization),
        body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      });

      const reply = replies.shift();
      if (!reply) throw new Error(`No stubbed reply for ${config.method} ${config.url}`);
      if ('error' in reply) throw reply.error;

      return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config };
    },
  });

  return { http, requests };
}

export function timeoutError(): AxiosError {
  return new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED');
}

export async function makeTempDirs(): Promise<{ cwd: string; home: string; cleanup: () => Promise<void> }> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'gitput-'));
  const cwd = path.join(root, 'demo');
  const home = path.join(root, 'home');
  await fs.ensureDir(cwd);
  await fs.ensureDir(home);
  return { cwd, home, cleanup: () => fs.remove(root) };
}
