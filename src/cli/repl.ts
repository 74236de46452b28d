// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interactive mode: questions and slash commands against one debugger.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import type { DebugApp } from './app.js';
import { currentIdentity } from './app.js';
import { renderRun, type OutputSink } from './render.js';
import { isCommand, runCommand, type CommandContext } from '../commands/index.js';
import { describeIdentity } from '../commands/session-commands.js';
import { InterruptHandler } from '../interrupt.js';
import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';
import type { Session, TargetIdentity } from '../types.js';

const PROMPT = chalk.bold.cyan('dbgmate> ');

export interface ReplOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

export async function startRepl(app: DebugApp, options: ReplOptions = {}): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const sink: OutputSink = { write: (text) => output.write(text) };

  const rl = readline.createInterface({ input, output, terminal: input.isTTY ?? false });
  const interrupts = new InterruptHandler();
  interrupts.setCallback(() => app.loop.requestInterrupt());
  if (input === process.stdin && process.stdin.isTTY) {
    interrupts.initialize(process.stdin, process.stdin);
  }

  let identity: TargetIdentity = await currentIdentity(app);
  let unsaved: Session | null = null;
  let processing = false;
  let closed = false;

  const context = (): CommandContext => ({
    identity,
    store: app.store,
    settings: app.settings,
    requestExit: () => rl.close(),
  });

  const ask = async (question: string): Promise<void> => {
    identity = await currentIdentity(app);
    interrupts.startProcessing();
    try {
      const outcome = await renderRun(app.loop.run(question, identity), sink);
      if (outcome.status === 'storage_error' && outcome.session) {
        unsaved = outcome.session;
        sink.write(chalk.yellow('Type /retry-save to try saving the transcript again.\n'));
      }
    } finally {
      interrupts.endProcessing();
    }
  };

  const retrySave = async (): Promise<void> => {
    if (!unsaved) {
      sink.write('Nothing to save.\n');
      return;
    }
    const result = await app.loop.retrySave(unsaved);
    if (result.ok) {
      unsaved = null;
      sink.write(chalk.green('Transcript saved.\n'));
    } else {
      sink.write(chalk.red(`Transcript not saved: ${result.message}\n`));
    }
  };

  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (!trimmed) return;

    if (trimmed === '/retry-save') {
      await retrySave();
    } else if (isCommand(trimmed)) {
      const result = await runCommand(trimmed, context());
      if (result) {
        sink.write(result + '\n');
      }
    } else {
      await ask(trimmed);
    }
  };

  // Ctrl-C at the prompt leaves; during a run it interrupts
  rl.on('SIGINT', () => {
    if (processing) {
      app.loop.requestInterrupt();
    } else {
      rl.close();
    }
  });

  sink.write(chalk.dim(`Target: ${describeIdentity(identity)}. Type /help for commands, ESC or Ctrl-C to interrupt.\n`));

  await new Promise<void>((resolve) => {
    const queue: string[] = [];

    const drain = async (): Promise<void> => {
      processing = true;
      rl.pause();
      while (queue.length > 0) {
        const line = queue.shift() ?? '';
        try {
          await handleLine(line);
        } catch (error) {
          logger.error(getErrorMessage(error), error instanceof Error ? error : undefined);
        }
      }
      processing = false;
      if (closed) {
        resolve();
        return;
      }
      rl.resume();
      rl.prompt();
    };

    rl.on('line', (line) => {
      queue.push(line);
      if (!processing) {
        void drain();
      }
    });

    rl.on('close', () => {
      closed = true;
      interrupts.destroy();
      if (!processing) {
        resolve();
      }
    });

    rl.setPrompt(PROMPT);
    rl.prompt();
  });
}
