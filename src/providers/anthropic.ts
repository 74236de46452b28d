// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './base.js';
import type { Message, ToolDefinition, ProviderResponse, ProviderConfig, ToolCallRequest } from '../types.js';
import { createProviderResponse, toToolInput } from './response-parser.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
const MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
    });
    this.model = config.model || DEFAULT_ANTHROPIC_MODEL;
  }

  private convertTools(tools: ToolDefinition[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object' as const,
        properties: tool.input_schema.properties,
        required: tool.input_schema.required,
      },
    }));
  }

  async streamChat(
    messages: Message[],
    tools?: ToolDefinition[],
    onChunk?: (chunk: string) => void,
    systemPrompt?: string
  ): Promise<ProviderResponse> {
    const stream = this.client.messages.stream({
      model: this.model,
      max_tokens: this.config.maxTokens ?? MAX_TOKENS,
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
      ...(systemPrompt && { system: systemPrompt }),
      messages: this.convertMessages(messages),
      tools: tools ? this.convertTools(tools) : undefined,
    });

    let fullContent = '';

    stream.on('text', (text: string) => {
      fullContent += text;
      onChunk?.(text);
    });

    const finalMessage = await stream.finalMessage();

    // Content blocks arrive in emission order
    const toolCalls: ToolCallRequest[] = [];
    for (const block of finalMessage.content) {
      if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          input: toToolInput(block.input),
        });
      }
    }

    return createProviderResponse({
      content: fullContent,
      toolCalls,
      stopReason: finalMessage.stop_reason,
      inputTokens: finalMessage.usage.input_tokens,
      outputTokens: finalMessage.usage.output_tokens,
    });
  }

  getName(): string {
    return 'Anthropic';
  }

  getModel(): string {
    return this.model;
  }

  private convertMessages(messages: Message[]): Anthropic.MessageParam[] {
    return messages.map((msg): Anthropic.MessageParam => {
      if (typeof msg.content === 'string') {
        return {
          role: msg.role,
          content: msg.content,
        };
      }

      const content: Array<
        | Anthropic.TextBlockParam
        | Anthropic.ToolUseBlockParam
        | Anthropic.ToolResultBlockParam
      > = msg.content.map((block) => {
        if (block.type === 'tool_use') {
          return {
            type: 'tool_use' as const,
            id: block.id || '',
            name: block.name || '',
            input: block.input || {},
          };
        }
        if (block.type === 'tool_result') {
          return {
            type: 'tool_result' as const,
            tool_use_id: block.tool_use_id || '',
            content: block.content || '',
            is_error: block.is_error || false,
          };
        }
        return { type: 'text' as const, text: block.text || '' };
      });

      return { role: msg.role, content };
    });
  }
}
