// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * System Prompt Generation
 *
 * Generates the system prompt for the debugging agent from the loaded target.
 */

import type { TargetIdentity } from '../types.js';
import { DEBUGGER_COMMAND_TOOL } from '../tools/debugger-command.js';

/**
 * Describe the loaded target in one line.
 */
export function describeTarget(identity: TargetIdentity): string {
  if (!identity.executable) {
    return 'No target is loaded. Ask the user for one, or load it yourself with `target create <path>`.';
  }
  const arch = identity.arch ? ` (${identity.arch})` : '';
  return `The loaded target is \`${identity.executable}\`${arch}.`;
}

/**
 * Generate the system prompt for the agent.
 *
 * @param identity - The target the session belongs to
 * @param override - Prompt from settings; replaces the built-in guidance
 */
export function generateSystemPrompt(identity: TargetIdentity, override?: string): string {
  if (override) {
    return `${override}\n\n${describeTarget(identity)}`;
  }

  return `You are an expert debugging assistant working inside an LLDB session. You inspect the program's state by running LLDB commands with the \`${DEBUGGER_COMMAND_TOOL}\` tool and reason over their output.

## Guidelines
1. **Look before you conclude**: Run commands to check state rather than guessing (e.g. \`bt\`, \`frame variable\`, \`thread list\`, \`register read\`).
2. **One command per call**: Each tool call runs exactly one LLDB command line.
3. **Read failures**: A failed command returns its error text. Adjust and try again, or explain what is missing.
4. **Mind side effects**: Commands like \`continue\`, \`step\`, \`process kill\` or \`expression\` change the program. Say so before running them.
5. **Be concise**: Answer the question directly, citing the output you relied on.

## Target
${describeTarget(identity)}`;
}
