// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  applySetting,
  defaultSettings,
  parseSettings,
  validateSettings,
} from '../src/config/validator.js';
import { SettingsStore, describeSettings, maskSecret } from '../src/config/settings-store.js';
import { SettingsError } from '../src/errors.js';

describe('parseSettings', () => {
  it('fills in defaults for an empty object', () => {
    expect(parseSettings({})).toEqual({
      settings: {
        provider: null,
        providers: {},
        maxToolCalls: 25,
        toolOutputLimit: 16000,
        debugger: { path: 'lldb', args: [] },
      },
      warnings: [],
    });
  });

  it('reads every known field', () => {
    const { settings } = parseSettings({
      provider: 'anthropic',
      providers: { anthropic: { model: 'claude-test', maxTokens: 2048, temperature: 0.2 } },
      maxToolCalls: 8,
      toolOutputLimit: 4000,
      systemPrompt: 'Be brief.',
      debugger: { path: '/usr/bin/lldb-18', args: ['--no-lldbinit'] },
    });

    expect(settings).toEqual({
      provider: 'anthropic',
      providers: { anthropic: { model: 'claude-test', maxTokens: 2048, temperature: 0.2 } },
      maxToolCalls: 8,
      toolOutputLimit: 4000,
      systemPrompt: 'Be brief.',
      debugger: { path: '/usr/bin/lldb-18', args: ['--no-lldbinit'] },
    });
  });

  it('warns about unknown keys instead of failing', () => {
    const { warnings } = parseSettings({
      theme: 'dark',
      providers: { gemini: {}, openai: { region: 'eu' } },
    });

    expect(warnings).toEqual([
      'Ignoring unknown setting "theme"',
      'Ignoring settings for unknown provider "gemini"',
      'Ignoring unknown setting "providers.openai.region"',
    ]);
  });

  it('rejects invalid values of known keys', () => {
    expect(() => parseSettings({ maxToolCalls: 0 })).toThrow('maxToolCalls must be a positive integer');
    expect(() => parseSettings({ provider: 'gemini' })).toThrow(
      'Unknown provider "gemini". Valid: anthropic, openai, ollama, mock'
    );
    expect(() => parseSettings({ debugger: { args: '--batch' } })).toThrow('debugger.args must be an array of strings');
    expect(() => parseSettings([])).toThrow(SettingsError);
  });
});

describe('applySetting', () => {
  it('sets and unsets top-level keys', () => {
    const base = defaultSettings();

    expect(applySetting(base, 'provider', 'openai').provider).toBe('openai');
    expect(applySetting(base, 'maxToolCalls', '5').maxToolCalls).toBe(5);
    expect(applySetting(base, 'debugger.args', '--no-lldbinit  -x').debugger.args).toEqual(['--no-lldbinit', '-x']);
    expect(applySetting({ ...base, maxToolCalls: 5 }, 'maxToolCalls', undefined).maxToolCalls).toBe(25);
    expect(applySetting({ ...base, provider: 'mock' }, 'provider', undefined).provider).toBeNull();
  });

  it('sets provider fields and drops empty provider entries', () => {
    const withKey = applySetting(defaultSettings(), 'providers.anthropic.apiKey', 'test-secret');
    expect(withKey.providers).toEqual({ anthropic: { apiKey: 'test-secret' } });

    const cleared = applySetting(withKey, 'providers.anthropic.apiKey', undefined);
    expect(cleared.providers).toEqual({});
  });

  it('does not change the settings it was given', () => {
    const base = defaultSettings();
    applySetting(base, 'debugger.path', '/opt/lldb');
    expect(base.debugger.path).toBe('lldb');
  });

  it('rejects unknown keys and bad values', () => {
    const base = defaultSettings();

    expect(() => applySetting(base, 'colour', 'blue')).toThrow(/^Unknown setting "colour"\. Valid: provider, /);
    expect(() => applySetting(base, 'providers.anthropic.region', 'eu')).toThrow(/^Unknown setting "providers.anthropic.region"/);
    expect(() => applySetting(base, 'maxToolCalls', 'many')).toThrow('maxToolCalls must be a number, got "many"');
    expect(() => applySetting(base, 'maxToolCalls', '2.5')).toThrow('maxToolCalls must be a positive integer');
    expect(() => applySetting(base, 'providers.openai.temperature', '3')).toThrow(
      'providers.openai.temperature must be a number between 0 and 2'
    );
  });
});

describe('validateSettings', () => {
  it('asks for a provider when none is selected', () => {
    expect(validateSettings(defaultSettings(), {})).toEqual([
      'No provider selected. Run: dbgmate config set provider <anthropic|openai|ollama|mock>',
    ]);
  });

  it('warns about a missing key unless the environment has one', () => {
    const settings = { ...defaultSettings(), provider: 'anthropic' as const };

    expect(validateSettings(settings, {})).toEqual([
      'No Anthropic API key: set providers.anthropic.apiKey or ANTHROPIC_API_KEY',
    ]);
    expect(validateSettings(settings, { ANTHROPIC_API_KEY: 'test-key' })).toEqual([]);
  });

  it('accepts openai without a key when a base URL is set', () => {
    const settings = {
      ...defaultSettings(),
      provider: 'openai' as const,
      providers: { openai: { baseUrl: 'http://localhost:8080/v1' } },
    };
    expect(validateSettings(settings, {})).toEqual([]);
  });

  it('warns about a tiny output limit', () => {
    const settings = { ...defaultSettings(), provider: 'ollama' as const, toolOutputLimit: 50 };
    expect(validateSettings(settings, {})).toEqual([
      'toolOutputLimit of 50 characters leaves the agent very little debugger output',
    ]);
  });
});

describe('SettingsStore', () => {
  let filePath: string;
  let store: SettingsStore;

  beforeEach(() => {
    filePath = join(mkdtempSync(join(tmpdir(), 'dbgmate-settings-')), 'settings.json');
    store = new SettingsStore(filePath);
  });

  it('uses defaults when there is no file', () => {
    expect(store.load()).toEqual([]);
    expect(store.get()).toEqual(defaultSettings());
    expect(existsSync(filePath)).toBe(false);
  });

  it('writes each change before it becomes visible', async () => {
    await store.set('provider', 'mock');
    await store.set('maxToolCalls', '12');

    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({
      ...defaultSettings(),
      provider: 'mock',
      maxToolCalls: 12,
    });

    const reloaded = new SettingsStore(filePath);
    reloaded.load();
    expect(reloaded.get()).toEqual(store.get());
  });

  it('hands out frozen snapshots that later changes do not touch', async () => {
    const before = store.get();

    await store.set('maxToolCalls', '3');

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.debugger)).toBe(true);
    expect(before.maxToolCalls).toBe(25);
    expect(store.get().maxToolCalls).toBe(3);
  });

  it('keeps the old snapshot when a change is rejected', async () => {
    await expect(store.set('maxToolCalls', '-1')).rejects.toThrow('maxToolCalls must be a positive integer');
    expect(store.get().maxToolCalls).toBe(25);
    expect(existsSync(filePath)).toBe(false);
  });

  it('unsets a key back to its default', async () => {
    await store.set('systemPrompt', 'Answer tersely.');
    await store.unset('systemPrompt');

    expect(store.get().systemPrompt).toBeUndefined();
  });

  it('reports malformed JSON', () => {
    writeFileSync(filePath, '{ "provider": ');
    expect(() => store.load()).toThrow(SettingsError);
    expect(() => store.load()).toThrow(`Failed to parse ${filePath}: `);
  });

  it('returns warnings from the file', () => {
    writeFileSync(filePath, JSON.stringify({ provider: 'ollama', colour: 'blue' }));
    expect(store.load()).toEqual(['Ignoring unknown setting "colour"']);
    expect(store.get().provider).toBe('ollama');
  });
});

describe('describeSettings', () => {
  it('masks keys and shows only configured providers', () => {
    const settings = {
      ...defaultSettings(),
      provider: 'anthropic' as const,
      providers: { anthropic: { model: 'claude-test', apiKey: 'test-secret-key' } },
    };

    expect(describeSettings(settings, {})).toBe([
      'provider: anthropic',
      'maxToolCalls: 25',
      'toolOutputLimit: 16000',
      'systemPrompt: (built-in)',
      'debugger.path: lldb',
      'debugger.args: (none)',
      'providers.anthropic:',
      '  model: claude-test',
      '  apiKey: test...-key',
    ].join('\n'));
  });

  it('shows keys that come from the environment', () => {
    const text = describeSettings(defaultSettings(), { OPENAI_API_KEY: 'placeholder-openai' });
    expect(text.split('\n').slice(-2)).toEqual([
      'providers.openai:',
      '  apiKey: plac...enai (from environment)',
    ]);
  });
});

describe('maskSecret', () => {
  it('hides short secrets entirely', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('test-secret-value')).toBe('test...alue');
  });
});
