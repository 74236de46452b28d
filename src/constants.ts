// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for dbgmate.
 */

/**
 * Agent loop configuration.
 */
export const AGENT_CONFIG = {
  /** Tool calls dispatched per run before stopping with limit_reached */
  MAX_TOOL_CALLS: 25,
  /** Tool output longer than this (characters) is truncated before it reaches the model */
  TOOL_OUTPUT_LIMIT: 16000,
} as const;

/**
 * Debugger process configuration.
 */
export const DEBUGGER_CONFIG = {
  /** Binary looked up on PATH when settings name none */
  DEFAULT_PATH: 'lldb',
} as const;

/**
 * Known provider ids, in the order `config show` lists them.
 */
export const PROVIDER_IDS = ['anthropic', 'openai', 'ollama', 'mock'] as const;

export type ProviderId = typeof PROVIDER_IDS[number];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}
