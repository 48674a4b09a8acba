import { Command } from 'commander';

import type { ShakeOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addShakeOptions, shakeCommand } from './shake.js';

export function setupUpdateCommand(program: Command): void {
  addShakeOptions(
    program
      .command('update')
      .description('Re-resolve every formula from metadata.yml and rewrite formula-requirements.txt')
  ).action(withErrorHandling(async (options: ShakeOptions) => {
    await shakeCommand('update', options);
  }));
}
