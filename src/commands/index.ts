// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Slash-command registry for the REPL. The same commands back the
 * `dbgmate reset`, `config` and `sessions` subcommands.
 */

import type { TargetIdentity } from '../types.js';
import type { SessionStore } from '../session/store.js';
import type { SettingsStore } from '../config/settings-store.js';

export interface CommandContext {
  /** Target the current transcript belongs to */
  identity: TargetIdentity;
  store: SessionStore;
  settings: SettingsStore;
  /** Ends the REPL */
  requestExit?: () => void;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  /** Returns text to print, or null for nothing */
  execute: (args: string, context: CommandContext) => Promise<string | null>;
}

function shouldShowHelp(args: string): boolean {
  const trimmed = args.trim().toLowerCase();
  return trimmed === 'help' || trimmed === '--help' || trimmed === '-h' || trimmed === '?';
}

export function formatCommandHelp(command: Command): string {
  const usage = command.usage.trim();
  if (!usage) {
    return `No help available for /${command.name}.`;
  }
  return `Usage: ${usage}\n\n${command.description}`;
}

// Command registry
const commands: Map<string, Command> = new Map();

export function registerCommand(command: Command): void {
  // Every command answers a standard help subcommand
  const wrapped: Command = {
    ...command,
    execute: async (args: string, context: CommandContext): Promise<string | null> => {
      if (shouldShowHelp(args)) {
        return formatCommandHelp(command);
      }
      return command.execute(args, context);
    },
  };

  commands.set(command.name, wrapped);
  if (command.aliases) {
    for (const alias of command.aliases) {
      commands.set(alias, wrapped);
    }
  }
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}

export function getAllCommands(): Command[] {
  // Return unique commands (filter out aliases)
  const seen = new Set<string>();
  const result: Command[] = [];
  for (const cmd of commands.values()) {
    if (!seen.has(cmd.name)) {
      seen.add(cmd.name);
      result.push(cmd);
    }
  }
  return result;
}

export function isCommand(input: string): boolean {
  return input.startsWith('/') && !input.startsWith('//');
}

export function parseCommand(input: string): { name: string; args: string } | null {
  if (!isCommand(input)) return null;

  const trimmed = input.slice(1).trim(); // Remove leading /
  const spaceIndex = trimmed.indexOf(' ');

  if (spaceIndex === -1) {
    return { name: trimmed.toLowerCase(), args: '' };
  }

  return {
    name: trimmed.slice(0, spaceIndex).toLowerCase(),
    args: trimmed.slice(spaceIndex + 1).trim(),
  };
}

/**
 * Run a parsed slash command.
 * @returns the command's output, or an unknown-command message
 */
export async function runCommand(input: string, context: CommandContext): Promise<string | null> {
  const parsed = parseCommand(input);
  if (!parsed) {
    return null;
  }
  const command = getCommand(parsed.name);
  if (!command) {
    return `Unknown command: /${parsed.name}. Type /help for a list.`;
  }
  return command.execute(parsed.args, context);
}
