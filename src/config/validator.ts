// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Settings Validator
 *
 * Parses settings.json into a typed Settings value, applies `config set`
 * edits, and reports warnings for settings that parse but look wrong.
 */

import { AGENT_CONFIG, DEBUGGER_CONFIG, PROVIDER_IDS, isProviderId, type ProviderId } from '../constants.js';
import { SettingsError } from '../errors.js';
import type { ProviderSettings, Settings } from './types.js';

const TOP_LEVEL_KEYS = ['provider', 'providers', 'maxToolCalls', 'toolOutputLimit', 'systemPrompt', 'debugger'];
const PROVIDER_STRING_FIELDS = ['model', 'apiKey', 'baseUrl', 'responsesFile'] as const;
const PROVIDER_NUMBER_FIELDS = ['maxTokens', 'temperature'] as const;

type ProviderStringField = typeof PROVIDER_STRING_FIELDS[number];
type ProviderNumberField = typeof PROVIDER_NUMBER_FIELDS[number];

/**
 * Keys accepted by `config set` / `config unset`. `<id>` stands for a
 * provider id.
 */
export const SETTABLE_KEYS = [
  'provider',
  'maxToolCalls',
  'toolOutputLimit',
  'systemPrompt',
  'debugger.path',
  'debugger.args',
  ...PROVIDER_STRING_FIELDS.map((field) => `providers.<id>.${field}`),
  ...PROVIDER_NUMBER_FIELDS.map((field) => `providers.<id>.${field}`),
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringField(field: string): field is ProviderStringField {
  return PROVIDER_STRING_FIELDS.some((f) => f === field);
}

function isNumberField(field: string): field is ProviderNumberField {
  return PROVIDER_NUMBER_FIELDS.some((f) => f === field);
}

export function defaultSettings(): Settings {
  return {
    provider: null,
    providers: {},
    maxToolCalls: AGENT_CONFIG.MAX_TOOL_CALLS,
    toolOutputLimit: AGENT_CONFIG.TOOL_OUTPUT_LIMIT,
    debugger: { path: DEBUGGER_CONFIG.DEFAULT_PATH, args: [] },
  };
}

function requirePositiveInteger(key: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new SettingsError(`${key} must be a positive integer`);
  }
  return value;
}

function requireString(key: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new SettingsError(`${key} must be a string`);
  }
  return value;
}

function requireProviderId(value: unknown): ProviderId {
  if (typeof value !== 'string' || !isProviderId(value)) {
    throw new SettingsError(`Unknown provider "${String(value)}". Valid: ${PROVIDER_IDS.join(', ')}`);
  }
  return value;
}

function checkProviderNumber(key: string, field: ProviderNumberField, value: unknown): number {
  if (field === 'maxTokens') {
    return requirePositiveInteger(key, value);
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 2) {
    throw new SettingsError(`${key} must be a number between 0 and 2`);
  }
  return value;
}

function parseProviderSettings(id: ProviderId, raw: unknown, warnings: string[]): ProviderSettings {
  if (!isRecord(raw)) {
    throw new SettingsError(`providers.${id} must be an object`);
  }
  const result: ProviderSettings = {};
  for (const [field, value] of Object.entries(raw)) {
    const key = `providers.${id}.${field}`;
    if (isStringField(field)) {
      result[field] = requireString(key, value);
    } else if (isNumberField(field)) {
      result[field] = checkProviderNumber(key, field, value);
    } else {
      warnings.push(`Ignoring unknown setting "${key}"`);
    }
  }
  return result;
}

/**
 * Turn the parsed contents of settings.json into Settings.
 * Missing fields take their defaults; unknown keys become warnings.
 * @throws SettingsError when a known field has an invalid value
 */
export function parseSettings(raw: unknown): { settings: Settings; warnings: string[] } {
  if (!isRecord(raw)) {
    throw new SettingsError('Settings must be a JSON object');
  }

  const warnings: string[] = [];
  const settings = defaultSettings();

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      warnings.push(`Ignoring unknown setting "${key}"`);
    }
  }

  if (raw.provider !== undefined && raw.provider !== null) {
    settings.provider = requireProviderId(raw.provider);
  }

  if (raw.providers !== undefined) {
    if (!isRecord(raw.providers)) {
      throw new SettingsError('providers must be an object');
    }
    for (const [id, value] of Object.entries(raw.providers)) {
      if (!isProviderId(id)) {
        warnings.push(`Ignoring settings for unknown provider "${id}"`);
        continue;
      }
      settings.providers[id] = parseProviderSettings(id, value, warnings);
    }
  }

  if (raw.maxToolCalls !== undefined) {
    settings.maxToolCalls = requirePositiveInteger('maxToolCalls', raw.maxToolCalls);
  }
  if (raw.toolOutputLimit !== undefined) {
    settings.toolOutputLimit = requirePositiveInteger('toolOutputLimit', raw.toolOutputLimit);
  }
  if (raw.systemPrompt !== undefined) {
    settings.systemPrompt = requireString('systemPrompt', raw.systemPrompt);
  }

  if (raw.debugger !== undefined) {
    if (!isRecord(raw.debugger)) {
      throw new SettingsError('debugger must be an object');
    }
    if (raw.debugger.path !== undefined) {
      settings.debugger.path = requireString('debugger.path', raw.debugger.path);
    }
    if (raw.debugger.args !== undefined) {
      const args = raw.debugger.args;
      if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
        throw new SettingsError('debugger.args must be an array of strings');
      }
      settings.debugger.args = args;
    }
  }

  return { settings, warnings };
}

function parseNumber(key: string, text: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new SettingsError(`${key} must be a number, got "${text}"`);
  }
  return value;
}

/**
 * Apply one `config set` (value given) or `config unset` (value undefined)
 * to a copy of the settings.
 * @throws SettingsError for unknown keys and invalid values
 */
export function applySetting(current: Settings, key: string, value: string | undefined): Settings {
  const next = structuredClone(current);
  const defaults = defaultSettings();

  switch (key) {
    case 'provider':
      next.provider = value === undefined ? null : requireProviderId(value.trim());
      return next;
    case 'maxToolCalls':
      next.maxToolCalls = value === undefined
        ? defaults.maxToolCalls
        : requirePositiveInteger(key, parseNumber(key, value));
      return next;
    case 'toolOutputLimit':
      next.toolOutputLimit = value === undefined
        ? defaults.toolOutputLimit
        : requirePositiveInteger(key, parseNumber(key, value));
      return next;
    case 'systemPrompt':
      if (value === undefined) {
        delete next.systemPrompt;
      } else {
        next.systemPrompt = value;
      }
      return next;
    case 'debugger.path':
      next.debugger.path = value === undefined ? defaults.debugger.path : value.trim();
      return next;
    case 'debugger.args':
      next.debugger.args = value === undefined ? [] : value.split(/\s+/).filter(Boolean);
      return next;
  }

  const match = /^providers\.([^.]+)\.([^.]+)$/.exec(key);
  if (!match) {
    throw new SettingsError(`Unknown setting "${key}". Valid: ${SETTABLE_KEYS.join(', ')}`);
  }

  const [, id, field] = match;
  const providerId = requireProviderId(id);
  const entry: ProviderSettings = { ...next.providers[providerId] };

  if (isStringField(field)) {
    if (value === undefined) {
      delete entry[field];
    } else {
      entry[field] = value.trim();
    }
  } else if (isNumberField(field)) {
    if (value === undefined) {
      delete entry[field];
    } else {
      entry[field] = checkProviderNumber(key, field, parseNumber(key, value));
    }
  } else {
    throw new SettingsError(`Unknown setting "${key}". Valid: ${SETTABLE_KEYS.join(', ')}`);
  }

  if (Object.keys(entry).length === 0) {
    delete next.providers[providerId];
  } else {
    next.providers[providerId] = entry;
  }
  return next;
}

/**
 * Validate parsed settings.
 * Returns an array of warning messages for settings that will not work as-is.
 */
export function validateSettings(settings: Settings, env: NodeJS.ProcessEnv = process.env): string[] {
  const warnings: string[] = [];

  if (settings.provider === null) {
    warnings.push('No provider selected. Run: dbgmate config set provider <' + PROVIDER_IDS.join('|') + '>');
  } else {
    const entry = settings.providers[settings.provider];
    if (settings.provider === 'anthropic' && !entry?.apiKey && !env.ANTHROPIC_API_KEY) {
      warnings.push('No Anthropic API key: set providers.anthropic.apiKey or ANTHROPIC_API_KEY');
    }
    if (settings.provider === 'openai' && !entry?.apiKey && !entry?.baseUrl && !env.OPENAI_API_KEY) {
      warnings.push('No OpenAI API key: set providers.openai.apiKey or OPENAI_API_KEY');
    }
    if (settings.provider === 'mock' && !entry?.responsesFile) {
      warnings.push('The mock provider answers every question with a fixed reply unless providers.mock.responsesFile is set');
    }
  }

  if (settings.toolOutputLimit < 200) {
    warnings.push(`toolOutputLimit of ${settings.toolOutputLimit} characters leaves the agent very little debugger output`);
  }

  return warnings;
}
