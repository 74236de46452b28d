// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal rendering of agent runs.
 */

import chalk from 'chalk';
import type { AgentEvent, RunOutcome } from '../agent/session-loop.js';
import type { ToolCall } from '../types.js';
import { spinner } from '../spinner.js';

export interface OutputSink {
  write(text: string): void;
}

export interface RenderOptions {
  /** Print one JSON object at the end instead of streaming text */
  json?: boolean;
}

/**
 * Result object printed by `ask --json`.
 */
export interface JsonRunResult {
  status: RunOutcome['status'];
  interrupted: boolean;
  answer: string | null;
  message: string | null;
  commands: Array<{ command: string; succeeded: boolean | null; interrupted: boolean }>;
}

function commandOf(call: ToolCall): string {
  return typeof call.arguments.command === 'string' ? call.arguments.command : call.name;
}

/**
 * One-line summary for outcomes other than a plain completion.
 */
export function describeOutcome(outcome: RunOutcome): string | null {
  switch (outcome.status) {
    case 'completed':
      return null;
    case 'interrupted':
      return 'Interrupted. Nothing from this question was saved.';
    case 'limit_reached':
      return `Stopped after ${outcome.toolCalls} debugger commands (maxToolCalls). The transcript so far was saved.`;
    case 'configuration_error':
      return `Configuration error: ${outcome.message}`;
    case 'agent_error':
      return `Agent error: ${outcome.message}`;
    case 'dispatch_error':
      return `Debugger error: ${outcome.message}`;
    case 'storage_error':
      return `Transcript not saved: ${outcome.message}`;
  }
}

export function toJsonResult(outcome: RunOutcome, calls: ToolCall[]): JsonRunResult {
  return {
    status: outcome.status,
    interrupted: outcome.interrupted,
    answer: outcome.status === 'completed' ? outcome.answer : outcome.status === 'storage_error' ? outcome.answer ?? null : null,
    message: 'message' in outcome ? outcome.message : describeOutcome(outcome),
    commands: calls.map((call) => ({
      command: commandOf(call),
      succeeded: call.result ? call.result.succeeded : null,
      interrupted: call.result ? call.result.interrupted : false,
    })),
  };
}

/**
 * Render a run as it streams. Returns the run's outcome.
 */
export async function renderRun(
  events: AsyncGenerator<AgentEvent, RunOutcome, undefined>,
  out: OutputSink,
  options: RenderOptions = {}
): Promise<RunOutcome> {
  const calls: ToolCall[] = [];
  let atLineStart = true;

  const endLine = (): void => {
    if (!atLineStart) {
      out.write('\n');
      atLineStart = true;
    }
  };

  if (!options.json) {
    spinner.thinking();
  }

  let result = await events.next();
  while (!result.done) {
    const event = result.value;
    switch (event.type) {
      case 'text':
        if (!options.json) {
          spinner.setStreaming(true);
          out.write(event.text);
          atLineStart = event.text.endsWith('\n');
        }
        break;

      case 'tool_call_started':
        if (!options.json) {
          endLine();
          spinner.setStreaming(false);
          if (spinner.isEnabled()) {
            spinner.toolStart(commandOf(event.call));
          } else {
            out.write(chalk.dim(`(lldb) ${commandOf(event.call)}\n`));
          }
        }
        break;

      case 'tool_call_finished':
        calls.push(event.call);
        if (!options.json && spinner.isSpinning()) {
          if (event.result.succeeded) {
            spinner.toolSucceed(commandOf(event.call));
          } else {
            spinner.toolFail(commandOf(event.call), event.result.error.split('\n')[0]);
          }
        }
        if (!options.json) {
          spinner.thinking();
        }
        break;

      case 'final':
        break;

      case 'outcome':
        spinner.stop();
        spinner.setStreaming(false);
        if (options.json) {
          out.write(JSON.stringify(toJsonResult(event.outcome, calls), null, 2) + '\n');
        } else {
          endLine();
          const summary = describeOutcome(event.outcome);
          if (summary) {
            const color = event.outcome.status === 'interrupted' || event.outcome.status === 'limit_reached'
              ? chalk.yellow
              : chalk.red;
            out.write(color(summary) + '\n');
          }
        }
        break;
    }
    result = await events.next();
  }

  return result.value;
}
