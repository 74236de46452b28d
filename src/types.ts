// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

// ============================================
// Provider wire types
// ============================================

/**
 * Represents a message with role and content, as sent to a provider.
 * @property {('user' | 'assistant')} role - The role of the sender.
 * @property {(string | ContentBlock[])} content - The content of the message.
 */
export interface Message {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

/**
 * Represents a block of content within a message.
 * @property {string} [id] - The ID of the block if it's a tool use.
 * @property {string} [tool_use_id] - The ID of the tool use a tool_result answers.
 * @property {string} [content] - tool_result content.
 */
export interface ContentBlock {
  type: 'text' | 'tool_use' | 'tool_result';
  text?: string;
  id?: string;
  name?: string;
  input?: Record<string, unknown>;
  tool_use_id?: string;
  content?: string;
  is_error?: boolean;
}

/**
 * Represents a definition of a tool offered to the model.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * A tool call as requested by the model, before it has been dispatched.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Token usage information from a provider response.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Represents a response from a provider.
 * @property {string} content - The text of the response.
 * @property {ToolCallRequest[]} toolCalls - Tool calls requested in this response, in emission order.
 */
export interface ProviderResponse {
  content: string;
  toolCalls: ToolCallRequest[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens';
  usage?: TokenUsage;
}

/**
 * Configuration for a provider: credentials and model parameters.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

// ============================================
// Transcript types
// ============================================

/**
 * Stable key identifying a debug target. `key` selects the transcript record;
 * `executable` and `arch` are kept for display and are null for the synthetic
 * no-target identity.
 */
export interface TargetIdentity {
  key: string;
  executable: string | null;
  arch: string | null;
}

/**
 * Outcome of one debugger command, as handed back to the model.
 */
export interface ToolResult {
  /** Text captured from the debugger */
  output: string;
  /** Error text, empty when none */
  error: string;
  succeeded: boolean;
  /** True if cancellation occurred before or during execution */
  interrupted: boolean;
}

/**
 * A tool call recorded in the transcript. `result` is absent while pending,
 * and stays absent for calls that were never dispatched.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  result?: ToolResult;
}

export type TurnRole = 'user' | 'agent' | 'tool';

/**
 * One exchange in a transcript. Turns are frozen once appended.
 */
export interface Turn {
  role: TurnRole;
  content: string;
  toolCalls: ToolCall[];
  /** ISO-8601 */
  timestamp: string;
}

/**
 * The ordered transcript for one target.
 */
export interface Session {
  identity: TargetIdentity;
  turns: Turn[];
}

/**
 * Summary of a stored transcript, without its turns.
 */
export interface SessionInfo {
  key: string;
  executable: string | null;
  arch: string | null;
  turnCount: number;
  updatedAt: string | null;
}
