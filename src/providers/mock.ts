// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Mock Provider for Testing
 *
 * A configurable provider that replays scripted responses, for deterministic
 * runs without real API calls. Responses can be passed in directly or loaded
 * from a JSON file (selected with `"provider": "mock"` and
 * `providers.mock.responsesFile` in settings).
 */

import { readFileSync, existsSync } from 'node:fs';
import { BaseProvider } from './base.js';
import { toToolInput } from './response-parser.js';
import type { Message, ToolDefinition, ProviderResponse, ToolCallRequest, TokenUsage } from '../types.js';
import { ConfigurationError, getErrorMessage } from '../errors.js';

/**
 * A single mock response configuration.
 */
export interface MockResponse {
  /** Text content to return */
  content?: string;
  /** Tool calls to return, in emission order */
  toolCalls?: ToolCallRequest[];
  /** Stop reason (defaults to 'end_turn' or 'tool_use' if toolCalls present) */
  stopReason?: 'end_turn' | 'tool_use' | 'max_tokens';
  /** Simulate an error */
  error?: Error;
  /** Optional token usage to report */
  usage?: TokenUsage;
  /** Invoked when the request arrives, before anything streams */
  onRequest?: () => void;
}

export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Default response when queue is empty */
  defaultResponse?: string;
  /** Delay between streaming chunks in ms (default: 0) */
  streamDelay?: number;
  /** Chunk size for streaming (default: 10 characters) */
  streamChunkSize?: number;
  /** Model name to report (default: 'mock-model') */
  model?: string;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  messages: Message[];
  tools?: ToolDefinition[];
  systemPrompt?: string;
  timestamp: Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseToolCalls(value: unknown, where: string): ToolCallRequest[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${where}.toolCalls must be an array`);
  }
  return value.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.id !== 'string' || typeof entry.name !== 'string') {
      throw new ConfigurationError(`${where}.toolCalls[${index}] needs string "id" and "name"`);
    }
    return { id: entry.id, name: entry.name, input: toToolInput(entry.input) };
  });
}

/**
 * Parse the contents of a mock responses file:
 * `{ "responses": [{ "content": "...", "toolCalls": [...] }], "defaultResponse": "..." }`
 */
export function parseMockResponsesFile(text: string): MockProviderConfig {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Mock responses file is not valid JSON: ${getErrorMessage(error)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigurationError('Mock responses file must contain a JSON object');
  }

  const rawResponses = data.responses ?? [];
  if (!Array.isArray(rawResponses)) {
    throw new ConfigurationError('"responses" must be an array');
  }

  const responses = rawResponses.map((entry: unknown, index): MockResponse => {
    const where = `responses[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${where} must be an object`);
    }
    return {
      content: typeof entry.content === 'string' ? entry.content : undefined,
      toolCalls: parseToolCalls(entry.toolCalls, where),
    };
  });

  return {
    responses,
    defaultResponse: typeof data.defaultResponse === 'string' ? data.defaultResponse : undefined,
  };
}

export class MockProvider extends BaseProvider {
  private responseQueue: MockResponse[];
  private defaultResponse: string;
  private streamDelay: number;
  private streamChunkSize: number;
  private modelName: string;
  private callHistory: MockCall[] = [];

  /**
   * Create a MockProvider from a responses file.
   */
  static fromFile(filePath: string, model?: string): MockProvider {
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Mock responses file not found: ${filePath}`);
    }
    const config = parseMockResponsesFile(readFileSync(filePath, 'utf-8'));
    return new MockProvider({ ...config, model });
  }

  constructor(config: MockProviderConfig = {}) {
    super({ model: config.model });
    this.responseQueue = [...(config.responses || [])];
    this.defaultResponse = config.defaultResponse || 'Mock response';
    this.streamDelay = config.streamDelay || 0;
    this.streamChunkSize = config.streamChunkSize || 10;
    this.modelName = config.model || 'mock-model';
  }

  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  getCallCount(): number {
    return this.callHistory.length;
  }

  reset(): void {
    this.callHistory = [];
    this.responseQueue = [];
  }

  private getNextResponse(): MockResponse {
    return this.responseQueue.shift() ?? { content: this.defaultResponse };
  }

  private buildResponse(mock: MockResponse): ProviderResponse {
    const toolCalls = mock.toolCalls || [];
    const stopReason = mock.stopReason || (toolCalls.length > 0 ? 'tool_use' : 'end_turn');

    return {
      content: mock.content || '',
      toolCalls,
      stopReason,
      usage: mock.usage || {
        inputTokens: 100,
        outputTokens: 50,
      },
    };
  }

  private recordCall(messages: Message[], tools?: ToolDefinition[], systemPrompt?: string): void {
    this.callHistory.push({
      messages: structuredClone(messages),
      tools: tools ? structuredClone(tools) : undefined,
      systemPrompt,
      timestamp: new Date(),
    });
  }

  async streamChat(
    messages: Message[],
    tools?: ToolDefinition[],
    onChunk?: (chunk: string) => void,
    systemPrompt?: string
  ): Promise<ProviderResponse> {
    this.recordCall(messages, tools, systemPrompt);

    const response = this.getNextResponse();
    response.onRequest?.();

    if (response.error) {
      throw response.error;
    }

    if (response.content && onChunk) {
      const content = response.content;
      for (let i = 0; i < content.length; i += this.streamChunkSize) {
        onChunk(content.slice(i, i + this.streamChunkSize));
        if (this.streamDelay > 0) {
          await new Promise(resolve => setTimeout(resolve, this.streamDelay));
        }
      }
    }

    return this.buildResponse(response);
  }

  getName(): string {
    return 'Mock';
  }

  getModel(): string {
    return this.modelName;
  }
}
