// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ToolDefinition } from '../types.js';

/**
 * The one tool offered to the model. Provider APIs only accept
 * `[a-zA-Z0-9_-]` in tool names.
 */
export const DEBUGGER_COMMAND_TOOL = 'execute_debugger_command';

export function getDebuggerCommandDefinition(): ToolDefinition {
  return {
    name: DEBUGGER_COMMAND_TOOL,
    description:
      'Execute one LLDB command in the current debug session and return its output. ' +
      'Use it to inspect threads, frames, variables, memory, registers, breakpoints and ' +
      'to control execution (e.g. "bt", "frame variable", "register read", "memory read", ' +
      '"breakpoint set", "continue"). Run one command per call.',
    input_schema: {
      type: 'object',
      properties: {
        command: {
          type: 'string',
          description: 'The LLDB command line to execute, exactly as typed at the (lldb) prompt',
        },
      },
      required: ['command'],
    },
  };
}

/**
 * Extract the `command` argument, or explain why it is unusable.
 */
export function parseCommandArgument(
  args: Record<string, unknown>
): { ok: true; command: string } | { ok: false; error: string } {
  const command = args.command;
  if (typeof command !== 'string') {
    return { ok: false, error: 'Missing required argument "command" (string)' };
  }
  if (command.trim() === '') {
    return { ok: false, error: 'Argument "command" must not be empty' };
  }
  return { ok: true, command };
}
