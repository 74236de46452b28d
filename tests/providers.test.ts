// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AnthropicProvider,
  MockProvider,
  OpenAICompatibleProvider,
  createProvider,
  createProviderFromSettings,
  getProviderTypes,
} from '../src/providers/index.js';
import { convertMessages, convertTools } from '../src/providers/openai-compatible.js';
import {
  StreamingToolCallAccumulator,
  createProviderResponse,
  mapStopReason,
  safeParseJson,
  toToolInput,
} from '../src/providers/response-parser.js';
import { defaultSettings } from '../src/config/validator.js';
import { ConfigurationError } from '../src/errors.js';
import { getDebuggerCommandDefinition } from '../src/tools/debugger-command.js';

describe('createProvider', () => {
  it('lists the provider ids', () => {
    expect(getProviderTypes()).toEqual(['anthropic', 'openai', 'ollama', 'mock']);
  });

  it('needs an Anthropic key from settings or the environment', () => {
    expect(() => createProvider({ type: 'anthropic' }, {})).toThrow(ConfigurationError);
    expect(() => createProvider({ type: 'anthropic' }, {})).toThrow(
      'Anthropic needs an API key. Run: dbgmate config set providers.anthropic.apiKey <key>, or set ANTHROPIC_API_KEY'
    );

    const provider = createProvider({ type: 'anthropic' }, { ANTHROPIC_API_KEY: 'test-key' });
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.getName()).toBe('Anthropic');
    expect(provider.getModel()).toBe('claude-sonnet-4-20250514');
  });

  it('needs an OpenAI key unless a base URL is set', () => {
    expect(() => createProvider({ type: 'openai' }, {})).toThrow(
      'OpenAI needs an API key. Run: dbgmate config set providers.openai.apiKey <key>, or set OPENAI_API_KEY'
    );

    const local = createProvider({ type: 'openai', baseUrl: 'http://localhost:8080/v1', model: 'local-model' }, {});
    expect(local).toBeInstanceOf(OpenAICompatibleProvider);
    expect(local.getModel()).toBe('local-model');
  });

  it('builds Ollama without a key', () => {
    const provider = createProvider({ type: 'ollama' }, {});
    expect(provider.getName()).toBe('Ollama');
    expect(provider.getModel()).toBe('llama3.2');
  });

  it('builds the mock provider from a responses file', async () => {
    const file = join(mkdtempSync(join(tmpdir(), 'dbgmate-mock-')), 'responses.json');
    writeFileSync(file, JSON.stringify({
      responses: [
        { content: 'Checking.', toolCalls: [{ id: 'c1', name: 'execute_debugger_command', input: { command: 'bt' } }] },
      ],
      defaultResponse: 'No more scripted answers.',
    }));

    const provider = createProvider({ type: 'mock', responsesFile: file }, {});
    const first = await provider.streamChat([{ role: 'user', content: 'Where?' }]);
    const second = await provider.streamChat([{ role: 'user', content: 'Where?' }]);

    expect(first.toolCalls).toEqual([{ id: 'c1', name: 'execute_debugger_command', input: { command: 'bt' } }]);
    expect(first.stopReason).toBe('tool_use');
    expect(second.content).toBe('No more scripted answers.');
  });

  it('reports a missing responses file', () => {
    expect(() => createProvider({ type: 'mock', responsesFile: '/nonexistent/responses.json' }, {})).toThrow(
      'Mock responses file not found: /nonexistent/responses.json'
    );
  });
});

describe('createProviderFromSettings', () => {
  it('refuses to guess a provider', () => {
    expect(() => createProviderFromSettings(defaultSettings(), {})).toThrow(
      'No provider configured. Run: dbgmate config set provider <anthropic|openai|ollama|mock>'
    );
  });

  it('passes the provider entry through', () => {
    const provider = createProviderFromSettings({
      ...defaultSettings(),
      provider: 'anthropic',
      providers: { anthropic: { apiKey: 'test-key', model: 'claude-test' } },
    }, {});
    expect(provider.getModel()).toBe('claude-test');
  });

  it('builds the mock provider with its fixed reply', async () => {
    const provider = createProviderFromSettings({ ...defaultSettings(), provider: 'mock' }, {});
    expect(provider).toBeInstanceOf(MockProvider);
    await expect(provider.streamChat([{ role: 'user', content: 'hi' }])).resolves.toMatchObject({
      content: 'Mock response',
      toolCalls: [],
      stopReason: 'end_turn',
    });
  });
});

describe('OpenAI message conversion', () => {
  it('turns tool_use and tool_result blocks into tool calls and tool messages', () => {
    expect(convertMessages([
      { role: 'user', content: 'Where am I?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 'c1', name: 'execute_debugger_command', input: { command: 'bt' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'c1', content: 'frame #0: main' },
          { type: 'text', text: 'And the locals?' },
        ],
      },
    ])).toEqual([
      { role: 'user', content: 'Where am I?' },
      {
        role: 'assistant',
        content: 'Checking.',
        tool_calls: [{
          id: 'c1',
          type: 'function',
          function: { name: 'execute_debugger_command', arguments: '{"command":"bt"}' },
        }],
      },
      { role: 'tool', tool_call_id: 'c1', content: 'frame #0: main' },
      { role: 'user', content: 'And the locals?' },
    ]);
  });

  it('wraps tool definitions as functions', () => {
    const [tool] = convertTools([getDebuggerCommandDefinition()]);
    expect(tool.type).toBe('function');
    expect(tool.function.name).toBe('execute_debugger_command');
    expect(tool.function.parameters).toEqual(getDebuggerCommandDefinition().input_schema);
  });
});

describe('response parsing', () => {
  it('maps stop reasons', () => {
    expect(mapStopReason('stop', false)).toBe('end_turn');
    expect(mapStopReason('length', false)).toBe('max_tokens');
    expect(mapStopReason('tool_calls', false)).toBe('tool_use');
    expect(mapStopReason('stop', true)).toBe('tool_use');
    expect(mapStopReason(null, false)).toBe('end_turn');
  });

  it('adds usage only when both counts are known', () => {
    expect(createProviderResponse({ content: 'hi', toolCalls: [], stopReason: 'stop' })).toEqual({
      content: 'hi',
      toolCalls: [],
      stopReason: 'end_turn',
    });
    expect(createProviderResponse({ content: '', toolCalls: [], inputTokens: 10, outputTokens: 2 }).usage).toEqual({
      inputTokens: 10,
      outputTokens: 2,
    });
  });

  it('parses tool arguments leniently', () => {
    expect(safeParseJson('{"command":"bt"}')).toEqual({ command: 'bt' });
    expect(safeParseJson('{"command":')).toEqual({});
    expect(safeParseJson('[1,2]')).toEqual({});
    expect(toToolInput('bt')).toEqual({});
  });

  it('assembles streamed tool calls in first-seen order', () => {
    const accumulator = new StreamingToolCallAccumulator();
    accumulator.accumulate(0, { id: 'c1', name: 'execute_debugger_command', arguments: '{"comm' });
    accumulator.accumulate(1, { id: 'c2', name: 'execute_debugger_command', arguments: '{"command":"frame variable"}' });
    accumulator.accumulate(0, { arguments: 'and":"bt"}' });

    expect(accumulator.hasToolCalls()).toBe(true);
    expect(accumulator.getToolCalls()).toEqual([
      { id: 'c1', name: 'execute_debugger_command', input: { command: 'bt' } },
      { id: 'c2', name: 'execute_debugger_command', input: { command: 'frame variable' } },
    ]);
  });
});
