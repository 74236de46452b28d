// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Spinner feedback with ora while the model is thinking or a debugger
 * command is running.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
export class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;
  private streaming = false;

  constructor(enabled: boolean = process.stdout.isTTY ?? false) {
    // Piped output gets no spinner
    this.enabled = enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled && !this.streaming;
  }

  /**
   * Mark that streaming output has started (disables spinner).
   */
  setStreaming(streaming: boolean): void {
    this.streaming = streaming;
    if (streaming) {
      this.stop();
    }
  }

  isSpinning(): boolean {
    return this.spinner !== null;
  }

  /**
   * Start a new spinner with the given text, replacing any running one.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    this.spinner?.stop();
    this.spinner = ora({
      text,
      color: 'cyan',
      spinner: 'dots',
      discardStdin: false, // stdin is read for interrupts
    }).start();
  }

  succeed(text?: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  fail(text?: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  /**
   * Show "Thinking..." spinner for model round-trips.
   */
  thinking(): void {
    this.start(chalk.cyan('Thinking...'));
  }

  toolStart(command: string): void {
    this.start(chalk.yellow(`(lldb) ${command}`));
  }

  toolSucceed(command: string): void {
    this.succeed(chalk.green(`(lldb) ${command}`));
  }

  toolFail(command: string, error?: string): void {
    const message = error
      ? chalk.red(`(lldb) ${command}`) + chalk.dim(` (${error})`)
      : chalk.red(`(lldb) ${command}`);
    this.fail(message);
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
