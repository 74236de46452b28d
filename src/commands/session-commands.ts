// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Transcript commands: reset, history and sessions.
 */

import { registerCommand, type Command, type CommandContext } from './index.js';
import { identityFromKey } from '../debugger/identity.js';
import type { SessionInfo, TargetIdentity, Turn } from '../types.js';

const DEFAULT_HISTORY_TURNS = 10;
const PREVIEW_LENGTH = 200;

export function describeIdentity(identity: TargetIdentity): string {
  if (!identity.executable) {
    return identity.key;
  }
  return identity.arch ? `${identity.executable} (${identity.arch})` : identity.executable;
}

/**
 * `2026-10-19T08:30:12.000Z` → `2026-10-19 08:30`
 */
function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}

function preview(text: string): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > PREVIEW_LENGTH ? `${oneLine.slice(0, PREVIEW_LENGTH)}...` : oneLine;
}

export function formatSessionInfo(info: SessionInfo): string {
  let display = info.key;
  display += ` (${info.turnCount} ${info.turnCount === 1 ? 'turn' : 'turns'})`;
  if (info.updatedAt) {
    display += ` - ${shortTimestamp(info.updatedAt)}`;
  }
  if (info.executable) {
    display += ` [${info.executable}${info.arch ? `, ${info.arch}` : ''}]`;
  }
  return display;
}

export function formatTurn(turn: Turn): string {
  const time = shortTimestamp(turn.timestamp);
  switch (turn.role) {
    case 'user':
      return `[${time}] you: ${preview(turn.content)}`;
    case 'agent':
      return `[${time}] agent: ${preview(turn.content)}`;
    case 'tool': {
      const lines = turn.toolCalls.map((call) => {
        const command = typeof call.arguments.command === 'string' ? call.arguments.command : call.name;
        let status = 'not executed';
        if (call.result) {
          status = call.result.interrupted ? 'interrupted' : call.result.succeeded ? 'ok' : 'failed';
        }
        return `  (lldb) ${command} -> ${status}`;
      });
      return [`[${time}] tools:`, ...lines].join('\n');
    }
  }
}

export const resetCommand: Command = {
  name: 'reset',
  aliases: ['clear'],
  description: 'Clear the stored transcript for the current target, or for the given key',
  usage: '/reset [key]',
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const key = args.trim();
    const identity = key ? identityFromKey(key) : context.identity;
    await context.store.clear(identity);
    return `Cleared transcript for ${describeIdentity(identity)}`;
  },
};

export const historyCommand: Command = {
  name: 'history',
  description: 'Show the latest turns of the current transcript',
  usage: `/history [count] (default ${DEFAULT_HISTORY_TURNS})`,
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const trimmed = args.trim();
    const count = trimmed ? Number.parseInt(trimmed, 10) : DEFAULT_HISTORY_TURNS;
    if (!Number.isInteger(count) || count <= 0) {
      return `Invalid count "${trimmed}". Usage: ${historyCommand.usage}`;
    }

    const session = await context.store.load(context.identity);
    if (session.turns.length === 0) {
      return `No transcript yet for ${describeIdentity(context.identity)}`;
    }

    const shown = session.turns.slice(-count);
    const header = `${describeIdentity(context.identity)}: showing ${shown.length} of ${session.turns.length} turns`;
    return [header, ...shown.map(formatTurn)].join('\n');
  },
};

export const sessionsCommand: Command = {
  name: 'sessions',
  description: 'List stored transcripts',
  usage: '/sessions',
  execute: async (_args: string, context: CommandContext): Promise<string | null> => {
    const sessions = await context.store.list();
    if (sessions.length === 0) {
      return 'No stored transcripts';
    }
    return sessions.map(formatSessionInfo).join('\n');
  },
};

// Register all session commands
export function registerSessionCommands(): void {
  registerCommand(resetCommand);
  registerCommand(historyCommand);
  registerCommand(sessionsCommand);
}
