/**
 * Plain OutputPort for pipes and CI logs: one line per event, no redraws.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(`> ${message}`);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  warn(message: string): void {
    console.warn(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    const body = content.split('\n').map(line => `  ${line}`).join('\n');
    console.log(title ? `\n${title}\n${body}` : `\n${body}`);
  },

  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? current}`);
      },
      // Progress updates would flood a log; only the last one is kept
      message(text: string) {
        current = text;
      }
    };
  }
};
