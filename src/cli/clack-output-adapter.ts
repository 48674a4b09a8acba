/**
 * Clack Output Adapter
 *
 * CLI implementation of the OutputPort defined in core/ports/output.ts,
 * routing to @clack/prompts for interactive terminal sessions.
 */

import { log, note as clackNote, spinner as clackSpinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    success(message: string): void {
      log.success(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Pick the clack output on a terminal, plain console output otherwise.
 */
export function createCliOutput(isInteractive: boolean = Boolean(process.stdout.isTTY)): OutputPort {
  return isInteractive ? createClackOutput() : consoleOutput;
}
