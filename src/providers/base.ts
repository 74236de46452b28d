// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { Message, ToolDefinition, ProviderResponse, ProviderConfig } from '../types.js';

/**
 * Abstract base class for hosted-agent backends.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Send a streaming chat completion request.
   * @param messages - Conversation history
   * @param tools - Tool definitions the model may call
   * @param onChunk - Callback for each text chunk received
   * @param systemPrompt - System prompt (uses native API support when available)
   * @returns Final provider response, with tool calls in emission order
   */
  abstract streamChat(
    messages: Message[],
    tools?: ToolDefinition[],
    onChunk?: (chunk: string) => void,
    systemPrompt?: string
  ): Promise<ProviderResponse>;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Get the current model being used.
   */
  abstract getModel(): string;
}
