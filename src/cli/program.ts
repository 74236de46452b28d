// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * The `dbgmate` command line.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from '../version.js';
import { logger, parseLogLevel } from '../logger.js';
import { DbgmateError, ErrorCategory, getErrorMessage } from '../errors.js';
import { InterruptHandler } from '../interrupt.js';
import { NO_TARGET_IDENTITY, identityFromKey } from '../debugger/identity.js';
import { FileSessionStore } from '../session/store.js';
import { getCommand, type CommandContext } from '../commands/index.js';
import { registerSessionCommands } from '../commands/session-commands.js';
import { registerConfigCommands } from '../commands/config-commands.js';
import { registerReplCommands } from '../commands/repl-commands.js';
import type { TargetIdentity } from '../types.js';
import { createDebugApp, currentIdentity, loadSettings, type TargetOptions } from './app.js';
import { renderRun } from './render.js';
import { startRepl } from './repl.js';

interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

interface AskOptions extends TargetOptions {
  json?: boolean;
}

interface ResetOptions extends TargetOptions {
  key?: string;
}

const stdoutSink = { write: (text: string): void => { process.stdout.write(text); } };

let commandsRegistered = false;

export function registerAllCommands(): void {
  if (commandsRegistered) return;
  registerSessionCommands();
  registerConfigCommands();
  registerReplCommands();
  commandsRegistered = true;
}

/**
 * Run a registered slash command from a subcommand and print its output.
 */
async function runRegistered(name: string, args: string, identity: TargetIdentity): Promise<void> {
  registerAllCommands();
  const command = getCommand(name);
  if (!command) {
    throw new DbgmateError(`Command ${name} is not registered`, ErrorCategory.SETTINGS);
  }
  const context: CommandContext = {
    identity,
    store: new FileSessionStore(),
    settings: loadSettings(),
  };
  const output = await command.execute(args, context);
  if (!output) return;
  if (output.startsWith('Error: ')) {
    console.log(chalk.red(output));
    process.exitCode = 1;
  } else {
    console.log(output);
  }
}

/**
 * Report a failed action. dbgmate's own errors print their message; anything
 * else is unexpected and gets the stack at DEBUG.
 */
function reportFailure(error: unknown): void {
  if (error instanceof DbgmateError) {
    logger.error(error.message, error);
  } else {
    logger.error(getErrorMessage(error), error instanceof Error ? error : undefined);
  }
  process.exitCode = 1;
}

function withErrorReporting<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportFailure(error);
    }
  };
}

async function resolveResetIdentity(options: ResetOptions): Promise<TargetIdentity> {
  if (options.key) {
    return identityFromKey(options.key);
  }
  if (!options.target) {
    return NO_TARGET_IDENTITY;
  }
  const app = await createDebugApp(options);
  try {
    return await currentIdentity(app);
  } finally {
    app.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dbgmate')
    .description('Ask an AI agent about a program running under LLDB')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Show each debugger command and its output')
    .option('--debug', 'Show model requests and internal state')
    .option('--trace', 'Show full request payloads')
    .hook('preAction', (thisCommand) => {
      logger.setLevel(parseLogLevel(thisCommand.opts<GlobalOptions>()));
    });

  program
    .command('ask')
    .description('Ask one question about the target and print the answer')
    .argument('<question...>', 'Question for the agent')
    .option('-t, --target <path>', 'Executable to load before asking')
    .option('-a, --arch <arch>', 'Architecture for the target')
    .option('--json', 'Print the outcome as JSON')
    .action(withErrorReporting(async (question: string[], options: AskOptions) => {
      const app = await createDebugApp(options);
      const interrupts = new InterruptHandler();
      interrupts.setCallback(() => app.loop.requestInterrupt());
      interrupts.captureTerminal(process.stdin);
      try {
        const identity = await currentIdentity(app);
        interrupts.startProcessing();
        const outcome = await renderRun(app.loop.run(question.join(' '), identity), stdoutSink, {
          json: options.json,
        });
        process.exitCode = outcome.status === 'completed' ? 0 : 1;
      } finally {
        interrupts.destroy();
        app.close();
      }
    }));

  program
    .command('reset')
    .description('Clear the stored transcript for a target')
    .option('-t, --target <path>', 'Executable whose transcript to clear')
    .option('-a, --arch <arch>', 'Architecture for the target')
    .option('-k, --key <key>', 'Identity key as shown by `dbgmate sessions`')
    .action(withErrorReporting(async (options: ResetOptions) => {
      const identity = await resolveResetIdentity(options);
      await runRegistered('reset', '', identity);
    }));

  program
    .command('config')
    .description('Show or change settings')
    .argument('[action]', 'show | set | unset | path | keys', 'show')
    .argument('[args...]', 'Key and value')
    .action(withErrorReporting(async (action: string, args: string[]) => {
      await runRegistered('config', [action, ...args].join(' '), NO_TARGET_IDENTITY);
    }));

  program
    .command('sessions')
    .description('List stored transcripts')
    .action(withErrorReporting(async () => {
      await runRegistered('sessions', '', NO_TARGET_IDENTITY);
    }));

  program
    .command('repl')
    .description('Ask questions and run slash commands interactively')
    .option('-t, --target <path>', 'Executable to load at start')
    .option('-a, --arch <arch>', 'Architecture for the target')
    .action(withErrorReporting(async (options: TargetOptions) => {
      registerAllCommands();
      const app = await createDebugApp(options);
      try {
        await startRepl(app);
      } finally {
        app.close();
      }
    }));

  return program;
}
