// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Shape of ~/.dbgmate/settings.json and of the snapshot handed to each run.
 */

import type { ProviderId } from '../constants.js';

/**
 * Per-provider options. Every field is optional; providers fill in their
 * own defaults.
 */
export interface ProviderSettings {
  /** Model name */
  model?: string;
  /** API key (falls back to ANTHROPIC_API_KEY / OPENAI_API_KEY) */
  apiKey?: string;
  /** Custom base URL for the API */
  baseUrl?: string;
  /** Response token limit */
  maxTokens?: number;
  /** Sampling temperature */
  temperature?: number;
  /** Scripted responses for the mock provider */
  responsesFile?: string;
}

export interface DebuggerSettings {
  /** Path to the lldb binary */
  path: string;
  /** Extra arguments passed to lldb */
  args: string[];
}

export interface Settings {
  /** Selected hosted agent, or null when none has been configured */
  provider: ProviderId | null;
  providers: Partial<Record<ProviderId, ProviderSettings>>;
  /** Tool-call budget for one run */
  maxToolCalls: number;
  /** Characters of tool output sent back to the model */
  toolOutputLimit: number;
  /** Replaces the built-in system prompt */
  systemPrompt?: string;
  debugger: DebuggerSettings;
}
