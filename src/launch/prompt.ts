/**
 * Terminal prompts
 */

import * as readline from 'readline';

/** Shows a message and resolves once the operator presses a key */
export type KeyWaiter = (message: string) => Promise<void>;

/**
 * Wait for any key on a TTY, or for Enter (or end of input) otherwise
 */
export const waitForKeypress: KeyWaiter = (message) => {
  const stdin = process.stdin;
  const text = message ? `${message} ` : '';

  if (!stdin.isTTY) {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: stdin, output: process.stdout });
      rl.once('close', () => resolve());
      rl.question(text, () => {
        rl.close();
      });
    });
  }

  return new Promise((resolve) => {
    process.stdout.write(text);
    stdin.setRawMode(true);
    stdin.resume();
    stdin.once('data', () => {
      stdin.setRawMode(false);
      stdin.pause();
      process.stdout.write('\n');
      resolve();
    });
  });
};

