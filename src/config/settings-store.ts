// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Settings Store
 *
 * Loads and saves ~/.dbgmate/settings.json. Readers get a frozen snapshot;
 * every change builds a new snapshot and is written to disk before it
 * becomes visible, so a run that already took its snapshot keeps it.
 */

import * as fs from 'node:fs';
import { logger } from '../logger.js';
import { DbgmatePaths } from '../paths.js';
import { writeFileAtomically } from '../utils/atomic-write.js';
import { SettingsError, getErrorMessage } from '../errors.js';
import { PROVIDER_IDS } from '../constants.js';
import { applySetting, defaultSettings, parseSettings } from './validator.js';
import type { Settings } from './types.js';

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function encodeSettings(settings: Settings): string {
  return JSON.stringify(settings, null, 2) + '\n';
}

export class SettingsStore {
  private readonly filePath: string;
  private snapshot: Readonly<Settings> = deepFreeze(defaultSettings());

  constructor(filePath: string = DbgmatePaths.settingsFile()) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * Read settings from disk. A missing file yields the defaults.
   * @returns warnings about unknown keys in the file
   * @throws SettingsError when the file is unreadable or malformed
   */
  load(): string[] {
    if (!fs.existsSync(this.filePath)) {
      logger.debug(`No settings at ${this.filePath}, using defaults`);
      this.snapshot = deepFreeze(defaultSettings());
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new SettingsError(`Failed to parse ${this.filePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    const { settings, warnings } = parseSettings(raw);
    this.snapshot = deepFreeze(settings);
    logger.debug(`Loaded settings from ${this.filePath}`);
    return warnings;
  }

  /**
   * The current settings. The returned object is frozen and never changes.
   */
  get(): Readonly<Settings> {
    return this.snapshot;
  }

  /**
   * Change one setting and write the result immediately.
   * @throws SettingsError for unknown keys, invalid values or a failed write
   */
  async set(key: string, value: string): Promise<Readonly<Settings>> {
    return this.commit(applySetting(this.snapshot, key, value));
  }

  /**
   * Reset one setting to its default and write the result immediately.
   */
  async unset(key: string): Promise<Readonly<Settings>> {
    return this.commit(applySetting(this.snapshot, key, undefined));
  }

  private async commit(next: Settings): Promise<Readonly<Settings>> {
    try {
      await writeFileAtomically(this.filePath, encodeSettings(next));
    } catch (error) {
      throw new SettingsError(`Failed to write ${this.filePath}: ${getErrorMessage(error)}`, { cause: error });
    }
    this.snapshot = deepFreeze(next);
    logger.debug(`Saved settings to ${this.filePath}`);
    return this.snapshot;
  }
}

export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
}

/**
 * Render settings for `config show`, with API keys masked.
 */
export function describeSettings(settings: Readonly<Settings>, env: NodeJS.ProcessEnv = process.env): string {
  const lines: string[] = [];
  lines.push(`provider: ${settings.provider ?? '(not set)'}`);
  lines.push(`maxToolCalls: ${settings.maxToolCalls}`);
  lines.push(`toolOutputLimit: ${settings.toolOutputLimit}`);
  lines.push(`systemPrompt: ${settings.systemPrompt === undefined ? '(built-in)' : JSON.stringify(settings.systemPrompt)}`);
  lines.push(`debugger.path: ${settings.debugger.path}`);
  lines.push(`debugger.args: ${settings.debugger.args.length > 0 ? settings.debugger.args.join(' ') : '(none)'}`);

  for (const id of PROVIDER_IDS) {
    const entry = settings.providers[id];
    const envKey = id === 'anthropic' ? env.ANTHROPIC_API_KEY : id === 'openai' ? env.OPENAI_API_KEY : undefined;
    if (!entry && !envKey) continue;

    lines.push(`providers.${id}:`);
    if (entry?.model) lines.push(`  model: ${entry.model}`);
    if (entry?.apiKey) {
      lines.push(`  apiKey: ${maskSecret(entry.apiKey)}`);
    } else if (envKey) {
      lines.push(`  apiKey: ${maskSecret(envKey)} (from environment)`);
    }
    if (entry?.baseUrl) lines.push(`  baseUrl: ${entry.baseUrl}`);
    if (entry?.maxTokens !== undefined) lines.push(`  maxTokens: ${entry.maxTokens}`);
    if (entry?.temperature !== undefined) lines.push(`  temperature: ${entry.temperature}`);
    if (entry?.responsesFile) lines.push(`  responsesFile: ${entry.responsesFile}`);
  }

  return lines.join('\n');
}
