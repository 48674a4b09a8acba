import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { Logger } from '../src/types/index.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { RemoteBranch, RemoteCommit, RemoteRepository, RemoteTag } from '../src/core/remote/types.js';
import type { ResolvedDependency } from '../src/types/index.js';
import type { GitRunner } from '../src/utils/git.js';
import { GitCommandError, RemoteConnectionError } from '../src/utils/errors.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

/**
 * Logger that records every call instead of printing.
 */
export class CapturingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

/**
 * OutputPort that records what would have been shown.
 */
export class CapturingOutput implements OutputPort {
  readonly lines: string[] = [];
  readonly notes: { content: string; title?: string }[] = [];

  info(message: string): void { this.lines.push(`info: ${message}`); }
  step(message: string): void { this.lines.push(`step: ${message}`); }
  success(message: string): void { this.lines.push(`success: ${message}`); }
  warn(message: string): void { this.lines.push(`warn: ${message}`); }

  note(content: string, title?: string): void {
    this.notes.push({ content, title });
  }

  spinner(): UnifiedSpinner {
    return {
      start: (message: string) => { this.lines.push(`spinner: ${message}`); },
      stop: (finalMessage?: string) => { this.lines.push(`spinner done: ${finalMessage ?? ''}`); },
      message: () => {}
    };
  }
}

export interface FakeRepo {
  tags?: RemoteTag[];
  /** Branch name to head sha */
  branches?: Record<string, string>;
  commits?: string[];
  /** Files by ref (sha), then by path */
  files?: Record<string, Record<string, string>>;
}

/**
 * In-memory RemoteRepository keyed by `organisation/name`, counting calls.
 */
export class FakeRemote implements RemoteRepository {
  readonly calls = {
    ensureAuthenticated: 0,
    listTags: new Map<string, number>(),
    getBranch: new Map<string, number>(),
    getCommit: new Map<string, number>(),
    fetchFile: new Map<string, number>()
  };

  constructor(
    private readonly repos: Record<string, FakeRepo>,
    private readonly authenticated = true
  ) {}

  async ensureAuthenticated(): Promise<void> {
    this.calls.ensureAuthenticated++;
    if (!this.authenticated) {
      throw new RemoteConnectionError('No GitHub token found');
    }
  }

  async listTags(organisation: string, name: string): Promise<RemoteTag[]> {
    const key = `${organisation}/${name}`;
    this.count(this.calls.listTags, key);
    return [...(this.repo(key).tags ?? [])];
  }

  async getBranch(organisation: string, name: string, branch: string): Promise<RemoteBranch | null> {
    const key = `${organisation}/${name}`;
    this.count(this.calls.getBranch, key);
    const sha = this.repo(key).branches?.[branch];
    return sha ? { name: branch, commitSha: sha } : null;
  }

  async getCommit(organisation: string, name: string, ref: string): Promise<RemoteCommit | null> {
    const key = `${organisation}/${name}`;
    this.count(this.calls.getCommit, key);
    return this.repo(key).commits?.includes(ref) ? { sha: ref } : null;
  }

  async fetchFile(organisation: string, name: string, ref: string, filePath: string): Promise<string | null> {
    const key = `${organisation}/${name}`;
    this.count(this.calls.fetchFile, key);
    return this.repo(key).files?.[ref]?.[filePath] ?? null;
  }

  callCount(kind: 'listTags' | 'getBranch' | 'getCommit' | 'fetchFile', key: string): number {
    return this.calls[kind].get(key) ?? 0;
  }

  private repo(key: string): FakeRepo {
    const repo = this.repos[key];
    if (!repo) {
      throw new RemoteConnectionError(`Repository ${key} not found`);
    }
    return repo;
  }

  private count(counter: Map<string, number>, key: string): void {
    counter.set(key, (counter.get(key) ?? 0) + 1);
  }
}

export function tag(name: string, commitSha: string): RemoteTag {
  return { name, commitSha };
}

export async function makeTempDir(prefix = 'formula-shaker-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface FakeCheckout {
  /** Head right after cloning */
  head: string;
  /** Files written into the checkout on clone, by relative path */
  files?: Record<string, string>;
}

/**
 * Git stand-in: clones materialize the configured files and every
 * directory's head is tracked in memory.
 */
export class FakeGit {
  readonly commands: string[] = [];
  private readonly heads = new Map<string, string>();

  constructor(
    private readonly checkouts: Record<string, FakeCheckout>,
    private failingClones = 0
  ) {}

  readonly run: GitRunner = async (args, cwd) => {
    this.commands.push(args.filter(arg => arg !== '--quiet').join(' '));
    const [command] = args;

    switch (command) {
      case 'clone': {
        const url = args[args.length - 2];
        const directory = args[args.length - 1];
        if (this.failingClones > 0) {
          this.failingClones--;
          throw new GitCommandError(`git clone ${url}: connection reset`);
        }
        const checkout = this.checkouts[url];
        if (!checkout) {
          throw new GitCommandError(`git clone ${url}: repository not found`);
        }
        await mkdir(directory, { recursive: true });
        for (const [file, content] of Object.entries(checkout.files ?? {})) {
          await mkdir(path.dirname(path.join(directory, file)), { recursive: true });
          await writeFile(path.join(directory, file), content);
        }
        this.heads.set(directory, checkout.head);
        return '';
      }
      case 'rev-parse':
        return this.heads.get(cwd ?? '') ?? '';
      case 'checkout':
        this.heads.set(cwd ?? '', args[args.length - 1]);
        return '';
      default:
        return '';
    }
  };
}

export function resolvedDependency(name: string, sha: string, tagName: string): ResolvedDependency {
  return {
    key: `test-org/${name}`,
    organisation: 'test-org',
    name,
    source: `git@github.com:test-org/${name}.git`,
    sha,
    tag: tagName
  };
}

export function resolvedMap(...dependencies: ResolvedDependency[]): Map<string, ResolvedDependency> {
  return new Map(dependencies.map(dependency => [dependency.key, dependency]));
}
