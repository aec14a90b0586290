// source/utilities/logger.ts
// Coloured log lines on stderr; plain output on stdout.

import chalk from 'chalk';

const info = (...message: string[]): void => {
  console.error(chalk.magenta('INFO:', ...message));
};

const warn = (...message: string[]): void => {
  console.error(chalk.yellow('WARNING:', ...message));
};

const error = (...message: string[]): void => {
  console.error(chalk.red('ERROR:', ...message));
};

const http = (...message: string[]): void => {
  console.error(chalk.blue('HTTP:', ...message));
};

const log = (...message: string[]): void => {
  console.log(...message);
};

export const logger = { info, warn, error, http, log };
