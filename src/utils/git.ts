import { execFile } from 'child_process';
import { promisify } from 'util';

import { GitCommandError } from './errors.js';

const execFileAsync = promisify(execFile);

/**
 * Runs a git command and resolves with its trimmed stdout.
 */
export type GitRunner = (args: string[], cwd?: string) => Promise<string>;

function describeFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) {
      return stderr;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export const runGit: GitRunner = async (args, cwd) => {
  try {
    const { stdout } = await execFileAsync('git', args, { cwd });
    return stdout.trim();
  } catch (error) {
    throw new GitCommandError(`git ${args.join(' ')}: ${describeFailure(error)}`, { args, cwd });
  }
};

export function isSha(ref: string): boolean {
  return /^[0-9a-f]{7,40}$/i.test(ref);
}

/**
 * Thin wrapper over the git operations a formula checkout needs.
 */
export class GitCheckout {
  constructor(private readonly git: GitRunner = runGit) {}

  async clone(url: string, directory: string): Promise<void> {
    await this.git(['clone', '--quiet', url, directory]);
  }

  async fetch(directory: string): Promise<void> {
    await this.git(['fetch', '--quiet', '--tags', 'origin'], directory);
  }

  async head(directory: string): Promise<string> {
    return this.git(['rev-parse', 'HEAD'], directory);
  }

  async checkout(directory: string, sha: string): Promise<void> {
    await this.git(['checkout', '--quiet', '--force', sha], directory);
  }
}
