/**
 * Model Relay - Logger Service
 * Centralized application logging with chalk styling and headless mode support
 */

import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
  level?: LogLevel;
  headless?: boolean;
}

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'info';
  private headless: boolean = false;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = new Logger();
    }
    return this.instance;
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.headless !== undefined) this.headless = options.headless;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.level === 'silent') return false;
    if (this.headless && level !== 'error') return false;

    const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
    return levels.indexOf(level) >= levels.indexOf(this.level);
  }

  // Task lifecycle
  taskCreated(id: string, provider: string, model: string, isAsync: boolean): void {
    if (!this.shouldLog('info')) return;
    const mode = isAsync ? 'async' : 'sync';
    console.log(chalk.cyan(`[Task ${id}] Created (${provider}/${model}, ${mode})`));
  }

  taskStarted(id: string, attempt: number): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[Task ${id}] Invoking provider (attempt ${attempt})`));
  }

  taskCompleted(id: string, durationMs: number): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`[Task ${id}] Completed in ${(durationMs / 1000).toFixed(1)}s`));
  }

  taskFailed(id: string, category: string, error: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(chalk.red(`[Task ${id}] Failed (${category}): ${error}`));
  }

  taskCancelled(id: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.yellow(`[Task ${id}] Cancelled`));
  }

  taskRetry(id: string, attempt: number, maxRetries: number, delayMs: number, error: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(
      chalk.yellow(`[Task ${id}] Retry ${attempt}/${maxRetries} in ${Math.round(delayMs)}ms: ${error}`)
    );
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
    if (this.level === 'silent') return;
    console.log(chalk.red(message));
  }

  // Banner
  banner(title: string, lines: string[] = []): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('\n' + '='.repeat(60)));
    console.log(chalk.cyan(`  ${title}`));
    for (const line of lines) {
      console.log(chalk.gray(`  ${line}`));
    }
    console.log(chalk.cyan('='.repeat(60)));
  }
}

export const logger = Logger.getInstance();
