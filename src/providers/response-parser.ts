// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shared response parsing utilities for providers.
 * Provides common operations for extracting tool calls, usage, and stop reasons.
 */

import type { ToolCallRequest, ProviderResponse } from '../types.js';

/**
 * Map a provider-specific stop reason to our standard format.
 */
export function mapStopReason(
  reason: string | null | undefined,
  hasToolCalls: boolean
): 'end_turn' | 'tool_use' | 'max_tokens' {
  if (hasToolCalls) {
    return 'tool_use';
  }

  const normalizedReason = reason?.toLowerCase() || '';

  if (normalizedReason.includes('tool')) {
    return 'tool_use';
  }
  if (normalizedReason.includes('length') || normalizedReason.includes('max_tokens')) {
    return 'max_tokens';
  }

  return 'end_turn';
}

/**
 * Create a standard ProviderResponse object.
 */
export function createProviderResponse(params: {
  content: string;
  toolCalls: ToolCallRequest[];
  stopReason?: string | null;
  inputTokens?: number;
  outputTokens?: number;
}): ProviderResponse {
  const { content, toolCalls, stopReason, inputTokens, outputTokens } = params;

  return {
    content,
    toolCalls,
    stopReason: mapStopReason(stopReason, toolCalls.length > 0),
    ...(inputTokens !== undefined && outputTokens !== undefined && {
      usage: {
        inputTokens,
        outputTokens,
      },
    }),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object string safely, returning an empty object on failure.
 */
export function safeParseJson(json: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(json || '{}');
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Coerce a provider-supplied tool input to an argument record.
 */
export function toToolInput(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/**
 * Accumulate streamed tool call arguments.
 * Handles the pattern of receiving partial JSON chunks during streaming.
 */
export class StreamingToolCallAccumulator {
  private toolCalls: Map<number | string, {
    id: string;
    name: string;
    rawArgs: string;
  }> = new Map();

  /**
   * Add or update a tool call with streamed data.
   */
  accumulate(index: number | string, data: {
    id?: string;
    name?: string;
    arguments?: string;
  }): void {
    let existing = this.toolCalls.get(index);

    if (!existing) {
      existing = { id: '', name: '', rawArgs: '' };
      this.toolCalls.set(index, existing);
    }

    if (data.id) {
      existing.id = data.id;
    }
    if (data.name) {
      existing.name = data.name;
    }
    if (data.arguments) {
      existing.rawArgs += data.arguments;
    }
  }

  /**
   * Get the finalized tool calls with parsed arguments, in first-seen order.
   */
  getToolCalls(): ToolCallRequest[] {
    return Array.from(this.toolCalls.values()).map(({ id, name, rawArgs }) => ({
      id,
      name,
      input: safeParseJson(rawArgs),
    }));
  }

  hasToolCalls(): boolean {
    return this.toolCalls.size > 0;
  }
}
