import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = !!options.verbose;
  return {
    info: (message) => console.log(chalk.blue('[INFO]'), message),
    success: (message) => console.log(chalk.green('[INFO]'), message),
    warn: (message) => console.warn(chalk.yellow('[WARN]'), message),
    error: (message) => console.error(chalk.red('[ERROR]'), message),
    debug: (message) => {
      if (verbose) console.log(chalk.gray('[DEBUG]'), chalk.gray(message));
    }
  };
}
