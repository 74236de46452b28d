// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interrupt handling for user-triggered interruption via ESC or Ctrl-C.
 * While a run is processing, either key (or SIGINT when stdin is not a
 * terminal) raises the run's interrupt latch through the registered callback.
 */

import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { logger } from './logger.js';
import { getErrorMessage } from './errors.js';

/**
 * Callback for when an interruption is triggered.
 */
export type InterruptCallback = () => void;

interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

type KeypressListener = (str: string | undefined, key: KeyInfo | undefined) => void;

/**
 * Emitter of `keypress` events, such as a readline interface.
 */
export interface KeypressSource {
  on(event: 'keypress', listener: KeypressListener): unknown;
  off(event: 'keypress', listener: KeypressListener): unknown;
}

/**
 * Emitter of SIGINT, normally `process`.
 */
export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * A terminal input that can be put into raw mode, normally process.stdin.
 */
export type TerminalInput = Readable & KeypressSource & {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
};

export class InterruptHandler {
  private source: KeypressSource | null = null;
  private terminal: TerminalInput | null = null;
  private callback: InterruptCallback | null = null;
  private isProcessing = false;
  private interruptRequested = false;
  private readonly signals: SignalSource;

  private readonly onKeypress: KeypressListener = (_str, key) => {
    if (!key) return;
    if (key.name === 'escape' || (key.ctrl && key.name === 'c')) {
      this.handleInterrupt(key.name === 'escape' ? 'ESC' : 'Ctrl-C');
    }
  };

  private readonly onSignal = (): void => {
    this.handleInterrupt('SIGINT');
  };

  constructor(signals: SignalSource = process) {
    this.signals = signals;
  }

  /**
   * Listen for keypresses. `input` is put into keypress mode when given
   * (pass process.stdin when `source` is a readline interface over it).
   */
  initialize(source: KeypressSource, input?: Readable): void {
    if (input) {
      readline.emitKeypressEvents(input);
    }
    this.source = source;
    source.on('keypress', this.onKeypress);
  }

  /**
   * Read ESC and Ctrl-C straight from a terminal in raw mode, for when no
   * readline interface owns it. Raw mode is undone by destroy(). Does nothing
   * when `input` is not a TTY.
   */
  captureTerminal(input: TerminalInput): void {
    if (!input.isTTY) return;
    this.initialize(input, input);
    input.setRawMode(true);
    input.resume();
    this.terminal = input;
  }

  /**
   * Set the callback for interruption events.
   */
  setCallback(callback: InterruptCallback): void {
    this.callback = callback;
  }

  /**
   * Mark that processing has started. SIGINT is captured until
   * endProcessing(), so Ctrl-C stops the run instead of the process.
   */
  startProcessing(): void {
    if (!this.isProcessing) {
      this.signals.on('SIGINT', this.onSignal);
    }
    this.isProcessing = true;
    this.interruptRequested = false;
  }

  /**
   * Mark that processing has completed.
   */
  endProcessing(): void {
    if (this.isProcessing) {
      this.signals.off('SIGINT', this.onSignal);
    }
    this.isProcessing = false;
  }

  /**
   * Check if an interrupt was requested.
   */
  wasInterrupted(): boolean {
    return this.interruptRequested;
  }

  private handleInterrupt(trigger: string): void {
    if (!this.isProcessing) {
      return;
    }
    if (this.interruptRequested) {
      logger.verbose('Already interrupting; waiting for the current debugger command to finish');
      return;
    }

    this.interruptRequested = true;
    logger.debug(`${trigger} pressed, interrupting agent`);

    if (this.callback) {
      try {
        this.callback();
      } catch (error) {
        logger.error(`Interrupt callback error: ${getErrorMessage(error)}`);
      }
    }
  }

  /**
   * Cleanup resources.
   */
  destroy(): void {
    this.endProcessing();
    this.source?.off('keypress', this.onKeypress);
    this.source = null;
    if (this.terminal) {
      this.terminal.setRawMode(false);
      this.terminal.pause();
      this.terminal = null;
    }
    this.callback = null;
    this.interruptRequested = false;
  }
}
