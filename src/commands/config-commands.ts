// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Settings management commands.
 */
import { registerCommand, type Command, type CommandContext } from './index.js';
import { describeSettings } from '../config/settings-store.js';
import { SETTABLE_KEYS, validateSettings } from '../config/validator.js';
import { SettingsError } from '../errors.js';

const USAGE = '/config [show | set <key> <value> | unset <key> | path | keys]';

function withWarnings(text: string, warnings: string[]): string {
  if (warnings.length === 0) return text;
  return [text, ...warnings.map((warning) => `Warning: ${warning}`)].join('\n');
}

/**
 * /config command - view or change settings.
 */
export const configCommand: Command = {
  name: 'config',
  aliases: ['cfg'],
  description: 'View or change settings. Changes are saved immediately and apply to the next question.',
  usage: USAGE,
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const trimmed = args.trim();
    const spaceIndex = trimmed.search(/\s/);
    const action = (spaceIndex === -1 ? trimmed : trimmed.slice(0, spaceIndex)).toLowerCase() || 'show';
    const rest = spaceIndex === -1 ? '' : trimmed.slice(spaceIndex + 1).trim();

    try {
      switch (action) {
        case 'show': {
          const settings = context.settings.get();
          return withWarnings(describeSettings(settings), validateSettings(settings));
        }

        case 'set': {
          const keyEnd = rest.search(/\s/);
          if (keyEnd === -1) {
            return `Usage: /config set <key> <value>`;
          }
          const key = rest.slice(0, keyEnd);
          const value = rest.slice(keyEnd + 1).trim();
          const settings = await context.settings.set(key, value);
          return withWarnings(`Set ${key}`, validateSettings(settings));
        }

        case 'unset': {
          if (!rest) {
            return `Usage: /config unset <key>`;
          }
          await context.settings.unset(rest);
          return `Unset ${rest}`;
        }

        case 'path':
          return context.settings.getPath();

        case 'keys':
          return SETTABLE_KEYS.join('\n');

        default:
          return `Unknown action "${action}". Usage: ${USAGE}`;
      }
    } catch (error) {
      if (error instanceof SettingsError) {
        return `Error: ${error.message}`;
      }
      throw error;
    }
  },
};

export function registerConfigCommands(): void {
  registerCommand(configCommand);
}
