// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * LLDB subprocess port.
 *
 * Drives an `lldb` process over its stdin/stdout. Each command is followed by
 * a sentinel command that prints a unique marker, so the output of one
 * command can be cut out of the stream without relying on prompts.
 */

import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { TargetIdentity } from '../types.js';
import type { CommandOutput, DebuggerCommandPort } from './port.js';
import { NO_TARGET_IDENTITY, deriveTargetIdentity, parseTargetList } from './identity.js';
import { DebuggerUnavailableError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * The subset of ChildProcess the port relies on.
 */
export interface DebuggerProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnDebugger = (path: string, args: string[]) => DebuggerProcess;

export interface LldbProcessOptions {
  /** Path to the lldb binary (default: "lldb") */
  path?: string;
  /** Extra arguments appended after --no-use-colors */
  args?: string[];
  /** Process factory, replaced in tests */
  spawnProcess?: SpawnDebugger;
}

interface PendingCommand {
  marker: string;
  resolve: (output: CommandOutput) => void;
  reject: (error: Error) => void;
}

const PROMPT_ECHO = /^\(lldb\)\s?/;
const ERROR_LINE = /^error:/m;

const defaultSpawn: SpawnDebugger = (path, args) => spawn(path, args, { stdio: 'pipe' });

/**
 * Build the sentinel command. The marker is split in two string literals so
 * an echoed command line never contains the marker itself.
 */
export function sentinelCommand(marker: string): string {
  const mid = Math.floor(marker.length / 2);
  return `script print("${marker.slice(0, mid)}" + "${marker.slice(mid)}")`;
}

/**
 * Drop prompt echoes and trailing whitespace from raw command output.
 */
export function cleanCommandOutput(raw: string): string {
  return raw
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => !PROMPT_ECHO.test(line))
    .join('\n')
    .trimEnd();
}

export class LldbProcessPort implements DebuggerCommandPort {
  private readonly path: string;
  private readonly args: string[];
  private readonly spawnProcess: SpawnDebugger;
  private process: DebuggerProcess | null = null;
  private exited = false;
  private stdoutBuffer = '';
  private stderrBuffer = '';
  private pending: PendingCommand | null = null;
  private sequence = 0;
  private readonly tag = randomUUID().slice(0, 8);

  constructor(options: LldbProcessOptions = {}) {
    this.path = options.path || 'lldb';
    this.args = options.args ?? [];
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  /**
   * Spawn the debugger. Idempotent.
   */
  start(): void {
    if (this.process) return;

    logger.debug(`Starting ${this.path} ${this.args.join(' ')}`.trimEnd());
    const proc = this.spawnProcess(this.path, ['--no-use-colors', ...this.args]);

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');

    proc.stdout.on('data', (chunk: string) => {
      this.stdoutBuffer += chunk;
      this.checkPending();
    });
    proc.stderr.on('data', (chunk: string) => {
      this.stderrBuffer += chunk;
    });
    proc.stdin.on('error', (error: Error) => {
      this.fail(new DebuggerUnavailableError(`${this.path} stdin closed: ${error.message}`));
    });
    proc.on('error', (error: Error) => {
      this.exited = true;
      this.fail(new DebuggerUnavailableError(`Failed to run ${this.path}: ${error.message}`));
    });
    proc.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exited = true;
      const reason = signal ? `signal ${signal}` : `code ${code}`;
      logger.debug(`${this.path} exited (${reason})`);
      this.fail(new DebuggerUnavailableError(`${this.path} exited (${reason})`));
    });

    this.process = proc;
  }

  async execute(command: string): Promise<CommandOutput> {
    const proc = this.requireProcess();
    if (this.pending) {
      // The dispatch lane never lets this happen
      throw new DebuggerUnavailableError('Another command is still in flight');
    }

    const marker = `__dbgmate_${this.tag}_${++this.sequence}__`;
    this.stdoutBuffer = '';
    this.stderrBuffer = '';

    return new Promise<CommandOutput>((resolve, reject) => {
      this.pending = { marker, resolve, reject };
      // One command per line; embedded newlines would run as separate commands
      const line = command.replace(/\r?\n/g, ' ');
      proc.stdin.write(`${line}\n${sentinelCommand(marker)}\n`);
    });
  }

  interrupt(): void {
    if (this.process && !this.exited) {
      this.process.kill('SIGINT');
    }
  }

  async getTargetIdentity(): Promise<TargetIdentity> {
    const result = await this.execute('target list');
    const target = parseTargetList(result.output);
    if (!target) {
      return NO_TARGET_IDENTITY;
    }
    return deriveTargetIdentity(target.executable, target.arch);
  }

  /**
   * Ask lldb to quit and release the process.
   */
  close(): void {
    if (!this.process || this.exited) return;

    const proc = this.process;
    proc.stdin.write('quit\n');
    proc.stdin.end();

    const timer = setTimeout(() => {
      if (!this.exited) {
        proc.kill('SIGTERM');
      }
    }, 2000);
    timer.unref();
  }

  isRunning(): boolean {
    return this.process !== null && !this.exited;
  }

  private requireProcess(): DebuggerProcess {
    if (!this.process) {
      throw new DebuggerUnavailableError(`${this.path} has not been started`);
    }
    if (this.exited) {
      throw new DebuggerUnavailableError(`${this.path} is no longer running`);
    }
    return this.process;
  }

  private checkPending(): void {
    const pending = this.pending;
    if (!pending) return;

    const markerIndex = this.findMarkerLine(pending.marker);
    if (markerIndex === -1) return;

    const raw = this.stdoutBuffer.slice(0, markerIndex);
    this.stdoutBuffer = '';
    this.pending = null;

    // stderr is a separate pipe; let any in-flight chunk land first
    setImmediate(() => {
      const errorText = this.stderrBuffer.trim();
      this.stderrBuffer = '';
      pending.resolve({
        output: cleanCommandOutput(raw),
        error: errorText,
        succeeded: !ERROR_LINE.test(errorText),
      });
    });
  }

  private findMarkerLine(marker: string): number {
    let from = 0;
    while (from <= this.stdoutBuffer.length) {
      const index = this.stdoutBuffer.indexOf(marker, from);
      if (index === -1) return -1;

      const atLineStart = index === 0 || this.stdoutBuffer[index - 1] === '\n';
      const after = this.stdoutBuffer.slice(index + marker.length, index + marker.length + 2);
      const atLineEnd = after.startsWith('\n') || after === '\r\n';
      if (atLineStart && atLineEnd) {
        return index;
      }
      from = index + marker.length;
    }
    return -1;
  }

  private fail(error: DebuggerUnavailableError): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.reject(error);
  }
}
