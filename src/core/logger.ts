/**
 * Console logger with chalk-coloured status prefixes
 */

import chalk from 'chalk';

export class Logger {
  constructor(private verbose: boolean = false) {}

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  info(message: string): void {
    console.log(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  heading(title: string): void {
    console.log(chalk.bold(`\n=== ${title} ===`));
  }

  detail(message: string): void {
    console.log(chalk.gray(`   ${message}`));
  }

  log(message: string): void {
    console.log(message);
  }
}

export function createLogger(verbose: boolean = false): Logger {
  return new Logger(verbose);
}

// Shared instance used by the CLI
export const logger = createLogger();
