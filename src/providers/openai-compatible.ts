// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import OpenAI from 'openai';
import { BaseProvider } from './base.js';
import type { Message, ToolDefinition, ProviderResponse, ProviderConfig } from '../types.js';
import { createProviderResponse, StreamingToolCallAccumulator } from './response-parser.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2';
export const OLLAMA_BASE_URL = 'http://localhost:11434/v1';
const MAX_TOKENS = 4096;

// Models that use max_completion_tokens instead of max_tokens
const COMPLETION_TOKEN_MODELS = ['gpt-5', 'o1', 'o3'];

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Ollama (via OpenAI compatibility layer)
 * - Any other OpenAI-compatible server
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI;
  private model: string;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
      baseURL: config.baseUrl,
    });
    this.model = config.model || DEFAULT_OPENAI_MODEL;
    this.providerName = config.providerName || 'OpenAI';
  }

  private getTokenParams(): { max_tokens?: number; max_completion_tokens?: number } {
    const limit = this.config.maxTokens ?? MAX_TOKENS;
    const usesCompletionTokens = COMPLETION_TOKEN_MODELS.some(m => this.model.startsWith(m));
    return usesCompletionTokens
      ? { max_completion_tokens: limit }
      : { max_tokens: limit };
  }

  async streamChat(
    messages: Message[],
    tools?: ToolDefinition[],
    onChunk?: (chunk: string) => void,
    systemPrompt?: string
  ): Promise<ProviderResponse> {
    const convertedMessages = convertMessages(messages);
    const messagesWithSystem: OpenAI.ChatCompletionMessageParam[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...convertedMessages]
      : convertedMessages;

    const stream = await this.client.chat.completions.create({
      model: this.model,
      ...this.getTokenParams(),
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
      messages: messagesWithSystem,
      tools: tools ? convertTools(tools) : undefined,
      stream: true,
      stream_options: { include_usage: true },
    });

    let fullContent = '';
    let finishReason: string | null = null;
    const toolCallAccumulator = new StreamingToolCallAccumulator();
    let streamUsage: { prompt_tokens: number; completion_tokens: number } | null = null;

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      const delta = choice?.delta;

      if (delta?.content) {
        fullContent += delta.content;
        onChunk?.(delta.content);
      }

      if (delta?.tool_calls) {
        for (const toolCallDelta of delta.tool_calls) {
          toolCallAccumulator.accumulate(toolCallDelta.index, {
            id: toolCallDelta.id,
            name: toolCallDelta.function?.name,
            arguments: toolCallDelta.function?.arguments,
          });
        }
      }

      if (choice?.finish_reason) {
        finishReason = choice.finish_reason;
      }

      // Sent on the final chunk when stream_options.include_usage is set
      if (chunk.usage) {
        streamUsage = {
          prompt_tokens: chunk.usage.prompt_tokens,
          completion_tokens: chunk.usage.completion_tokens,
        };
      }
    }

    return createProviderResponse({
      content: fullContent,
      toolCalls: toolCallAccumulator.getToolCalls(),
      stopReason: finishReason,
      inputTokens: streamUsage?.prompt_tokens ?? 0,
      outputTokens: streamUsage?.completion_tokens ?? Math.ceil(fullContent.length / 4),
    });
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.model;
  }
}

/**
 * Convert transcript messages to chat-completion messages.
 * OpenAI requires all tool_calls in a single assistant message, and each
 * tool result as its own `tool` message right after it.
 */
export function convertMessages(messages: Message[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.flatMap((msg): OpenAI.ChatCompletionMessageParam[] => {
    if (typeof msg.content === 'string') {
      return msg.role === 'assistant'
        ? [{ role: 'assistant', content: msg.content }]
        : [{ role: 'user', content: msg.content }];
    }

    const parts: OpenAI.ChatCompletionMessageParam[] = [];
    const toolCalls: OpenAI.ChatCompletionMessageToolCall[] = [];
    const toolResults: OpenAI.ChatCompletionToolMessageParam[] = [];
    let textContent = '';

    for (const block of msg.content) {
      if (block.type === 'text') {
        textContent += block.text || '';
      } else if (block.type === 'tool_use' && msg.role === 'assistant') {
        toolCalls.push({
          id: block.id || '',
          type: 'function',
          function: {
            name: block.name || '',
            arguments: JSON.stringify(block.input || {}),
          },
        });
      } else if (block.type === 'tool_result') {
        toolResults.push({
          role: 'tool',
          tool_call_id: block.tool_use_id || '',
          content: block.content || '',
        });
      }
    }

    if (toolCalls.length > 0) {
      parts.push({
        role: 'assistant',
        content: textContent || null,
        tool_calls: toolCalls,
      });
      textContent = '';
    }

    parts.push(...toolResults);

    if (textContent) {
      parts.push(msg.role === 'assistant'
        ? { role: 'assistant', content: textContent }
        : { role: 'user', content: textContent });
    }

    return parts;
  });
}

export function convertTools(tools: ToolDefinition[]): OpenAI.ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

/**
 * Create a provider for Ollama (running locally)
 */
export function createOllamaProvider(config: ProviderConfig = {}): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider({
    ...config,
    apiKey: config.apiKey || 'not-needed',
    baseUrl: config.baseUrl || OLLAMA_BASE_URL,
    model: config.model || DEFAULT_OLLAMA_MODEL,
    providerName: 'Ollama',
  });
}
