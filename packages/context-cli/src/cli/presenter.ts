/**
 * Terminal presenter: the document on stdout, feedback on stderr
 */

import chalk from 'chalk';
import type { Presenter } from './types.js';

export function createConsolePresenter(): Presenter {
  return {
    write(text) {
      process.stdout.write(text);
    },
    info(message) {
      process.stderr.write(`${chalk.cyan(message)}\n`);
    },
    error(message) {
      process.stderr.write(`${chalk.red(`✗ ${message}`)}\n`);
    },
    json(data) {
      process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
    },
  };
}
