// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Conversion from transcript turns to provider messages.
 *
 * A tool turn becomes an assistant message carrying the tool_use blocks,
 * followed by a user message with one tool_result per call, in the same
 * order. Consecutive messages of one role are merged, since providers
 * expect the roles to alternate.
 */

import type { ContentBlock, Message, ToolResult, Turn } from '../types.js';

export const NOT_EXECUTED = 'Not executed: the tool-call limit for that request was reached';

/**
 * Cut `text` to `limit` characters, marking how much was dropped.
 */
export function truncateOutput(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}\n... [truncated ${text.length - limit} characters]`;
}

/**
 * Render a tool result as the text the model sees.
 */
export function formatToolResult(result: ToolResult, limit: number): string {
  const parts: string[] = [];
  if (result.output) {
    parts.push(truncateOutput(result.output, limit));
  }
  if (result.error) {
    parts.push(`Error: ${truncateOutput(result.error, limit)}`);
  }
  if (result.interrupted) {
    parts.push('[interrupted by the user]');
  }
  return parts.length > 0 ? parts.join('\n') : '(no output)';
}

function toBlocks(content: string | ContentBlock[]): ContentBlock[] {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

function pushMessage(messages: Message[], message: Message): void {
  const previous = messages[messages.length - 1];
  if (previous && previous.role === message.role) {
    messages[messages.length - 1] = {
      role: previous.role,
      content: [...toBlocks(previous.content), ...toBlocks(message.content)],
    };
    return;
  }
  messages.push(message);
}

function toolTurnMessages(turn: Turn, outputLimit: number): Message[] {
  const uses: ContentBlock[] = [];
  if (turn.content) {
    uses.push({ type: 'text', text: turn.content });
  }

  const results: ContentBlock[] = [];
  for (const call of turn.toolCalls) {
    uses.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
    results.push(call.result
      ? {
          type: 'tool_result',
          tool_use_id: call.id,
          content: formatToolResult(call.result, outputLimit),
          is_error: !call.result.succeeded,
        }
      : { type: 'tool_result', tool_use_id: call.id, content: NOT_EXECUTED, is_error: true });
  }

  return [
    { role: 'assistant', content: uses },
    { role: 'user', content: results },
  ];
}

/**
 * Build the provider message history for a transcript.
 */
export function turnsToMessages(turns: readonly Turn[], outputLimit: number): Message[] {
  const messages: Message[] = [];

  for (const turn of turns) {
    switch (turn.role) {
      case 'user':
        pushMessage(messages, { role: 'user', content: turn.content });
        break;
      case 'agent':
        pushMessage(messages, { role: 'assistant', content: turn.content || '(no answer)' });
        break;
      case 'tool':
        for (const message of toolTurnMessages(turn, outputLimit)) {
          pushMessage(messages, message);
        }
        break;
    }
  }

  return messages;
}
