// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * REPL housekeeping commands: help and exit.
 */
import { getAllCommands, registerCommand, type Command, type CommandContext } from './index.js';

export const helpCommand: Command = {
  name: 'help',
  aliases: ['?'],
  description: 'List commands. Anything that is not a command is sent to the agent as a question.',
  usage: '/help',
  execute: async (): Promise<string | null> => {
    const lines = getAllCommands()
      .slice()
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((command) => `  ${command.usage.padEnd(28)} ${command.description}`);
    return ['Commands:', ...lines].join('\n');
  },
};

export const exitCommand: Command = {
  name: 'exit',
  aliases: ['quit', 'q'],
  description: 'Leave the REPL',
  usage: '/exit',
  execute: async (_args: string, context: CommandContext): Promise<string | null> => {
    context.requestExit?.();
    return null;
  },
};

export function registerReplCommands(): void {
  registerCommand(helpCommand);
  registerCommand(exitCommand);
}
