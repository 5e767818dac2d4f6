/**
 * Testimony Engine - Logger Service
 * Centralized logging with chalk styling and headless mode support
 */

import chalk from 'chalk';
import { CLAIM_TRUNCATION, SEPARATOR_WIDTH } from '../config/constants.js';
import type { LogLevel, ValidationResult } from '../types/index.js';

export interface LoggerOptions {
  level?: LogLevel;
  headless?: boolean;
  verbose?: boolean;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'info';
  private headless: boolean = false;
  private verbose: boolean = false;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = new Logger();
    }
    return this.instance;
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.headless !== undefined) this.headless = options.headless;
    if (options.verbose !== undefined) this.verbose = options.verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.level === 'silent') return false;
    if (this.headless && level !== 'error') return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  // World authoring
  authored(kind: string, id: string): void {
    if (!this.verbose || !this.shouldLog('debug')) return;
    console.log(chalk.gray(`[World] ${kind} ${id}`));
  }

  // Verdicts
  verdict(character: string, result: ValidationResult): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    const status = result.isValid ? chalk.green('✓') : chalk.red('✗');
    const flag = result.isLie ? chalk.red(' [LIE]') : result.isOmission ? chalk.yellow(' [OMISSION]') : '';
    const text = result.claim.claimText.substring(0, CLAIM_TRUNCATION);
    console.log(`  ${status} [${character}] ${text}${flag} ${chalk.gray(result.reason)}`);
  }

  // Conversation turns
  turn(speaker: string, message: string): void {
    if (!this.verbose || !this.shouldLog('info')) return;
    console.log(chalk.cyan(`[${speaker}] `) + message);
  }

  // General logging
  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.white(message));
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    if (!this.shouldLog('error')) return;
    console.log(chalk.red(message));
  }

  banner(title: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('\n' + '='.repeat(SEPARATOR_WIDTH)));
    console.log(chalk.cyan(`  ${title}`));
    console.log(chalk.cyan('='.repeat(SEPARATOR_WIDTH)));
  }

  separator(): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('-'.repeat(SEPARATOR_WIDTH)));
  }
}

export const logger = Logger.getInstance();
