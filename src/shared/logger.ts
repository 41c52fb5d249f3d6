import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(label: string, detail?: string): void;
}

export function createLogger(verbose: boolean): Logger {
  return {
    info: (message) => console.log(chalk.gray(message)),
    success: (message) => console.log(chalk.green(`✅ ${message}`)),
    warn: (message) => console.warn(chalk.yellow(`⚠️  ${message}`)),
    error: (message) => console.error(chalk.red(`❌ ${message}`)),
    debug: (label, detail) => {
      if (!verbose) return;
      console.error(chalk.gray(`\n[Debug] ${label}`));
      if (detail !== undefined) {
        console.error(detail);
      }
    },
  };
}
