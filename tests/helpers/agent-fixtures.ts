// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shared builders for agent loop tests.
 */

import type { AgentEvent, RunOutcome, SettingsSource } from '../../src/agent/session-loop.js';
import { defaultSettings } from '../../src/config/validator.js';
import type { Settings } from '../../src/config/types.js';
import { DEBUGGER_COMMAND_TOOL } from '../../src/tools/debugger-command.js';
import type { ToolCallRequest } from '../../src/types.js';

export const START_TIME = Date.UTC(2026, 9, 19, 8, 30, 0);

/**
 * A tool call asking for one LLDB command.
 */
export function debuggerCall(id: string, command: string): ToolCallRequest {
  return { id, name: DEBUGGER_COMMAND_TOOL, input: { command } };
}

/**
 * Clock that starts at START_TIME and advances one second per reading.
 */
export function steppingClock(start: number = START_TIME): () => Date {
  let ticks = 0;
  return () => new Date(start + ticks++ * 1000);
}

/**
 * Settings source over a fixed snapshot, with the mock provider selected.
 */
export function fixedSettings(overrides: Partial<Settings> = {}): SettingsSource & { current: Readonly<Settings> } {
  const source = {
    current: Object.freeze({ ...defaultSettings(), provider: 'mock' as const, ...overrides }),
    get(): Readonly<Settings> {
      return source.current;
    },
  };
  return source;
}

/**
 * Drain a run, keeping every event and the returned outcome.
 */
export async function collectRun(
  run: AsyncGenerator<AgentEvent, RunOutcome, undefined>
): Promise<{ events: AgentEvent[]; outcome: RunOutcome }> {
  const events: AgentEvent[] = [];
  let result = await run.next();
  while (!result.done) {
    events.push(result.value);
    result = await run.next();
  }
  return { events, outcome: result.value };
}

export function streamedText(events: AgentEvent[]): string {
  return events.map((event) => (event.type === 'text' ? event.text : '')).join('');
}
