import chalk from 'chalk';

/**
 * Progress and diagnostic output used by library code.
 * Commands print directly; services report through this so they can run quietly.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  detail(message: string): void;
}

export const consoleReporter: Reporter = {
  info: (message) => console.log(chalk.blue(message)),
  success: (message) => console.log(chalk.green(message)),
  warn: (message) => console.log(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
  detail: (message) => console.log(chalk.dim(message)),
};

export const silentReporter: Reporter = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  detail: () => {},
};
