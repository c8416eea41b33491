/**
 * @file logger.ts - Terminal output
 * @description Colored status lines for the CLI. Engine diagnostics go through LoggerService.
 * @depends chalk
 */

import chalk from 'chalk';

export class Logger {
  static info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  static success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  static error(message: string): void {
    console.error(chalk.red('✖'), message);
  }

  static warning(message: string): void {
    console.warn(chalk.yellow('⚠'), message);
  }

  static field(label: string, value: string | number | boolean): void {
    console.log(`  ${chalk.gray(`${label}:`)} ${value}`);
  }
}
