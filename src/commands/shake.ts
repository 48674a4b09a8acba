import { Command } from 'commander';

import type { ShakeOptions } from '../types/index.js';
import { runShake, type ShakeMode } from '../core/shaker.js';
import { withErrorHandling } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { createCliOutput } from '../cli/clack-output-adapter.js';

/**
 * Options shared by `shake` and `update`.
 */
export function addShakeOptions(command: Command): Command {
  return command
    .option('--root-dir <dir>', 'directory holding metadata.yml and formula-requirements.txt', '.')
    .option('-v, --verbose', 'log progress')
    .option('--debug', 'log everything, including remote calls')
    .option('--simulate', 'resolve and print the requirements without touching the workspace')
    .option('--ignore-dependency-requirements', "read dependencies' metadata.yml instead of their pinned requirements")
    .option('--include-prereleases', 'allow prerelease tags to satisfy version ranges');
}

export async function shakeCommand(mode: ShakeMode, options: ShakeOptions): Promise<void> {
  const logger = createLogger(options);
  const output = createCliOutput();
  const result = await runShake(mode, options, { logger, output });
  if (!result.success) {
    throw new Error(result.error ?? 'Shake failed');
  }
}

export function setupShakeCommand(program: Command): void {
  addShakeOptions(
    program
      .command('shake')
      .description('Install formulas pinned in formula-requirements.txt, resolving from metadata.yml when there is none')
  ).action(withErrorHandling(async (options: ShakeOptions) => {
    await shakeCommand('refresh', options);
  }));
}
