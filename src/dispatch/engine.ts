// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tool Dispatch Engine - the sole mediator between the agent's tool calls
 * and the debugger's single-threaded command interpreter.
 *
 * - Every command runs inside the DispatchLane, so at most one `execute` is
 *   outstanding against the port at any time.
 * - Command failures come back as data in the ToolResult.
 * - Transport failures of the port are thrown as DispatchError.
 * - The interrupt latch stops new work from starting. A command already
 *   handed to the debugger runs to completion and is reported with
 *   `interrupted: true`.
 */

import type { ToolCall, ToolResult, TargetIdentity } from '../types.js';
import type { CommandOutput, DebuggerCommandPort } from '../debugger/port.js';
import { DispatchLane } from './lane.js';
import { DispatchError, getErrorMessage } from '../errors.js';
import { DEBUGGER_COMMAND_TOOL, parseCommandArgument } from '../tools/debugger-command.js';
import { logger } from '../logger.js';

const INTERRUPTED_BEFORE_EXECUTION = 'Interrupted before execution';

function refusedResult(): ToolResult {
  return {
    output: '',
    error: INTERRUPTED_BEFORE_EXECUTION,
    succeeded: false,
    interrupted: true,
  };
}

function commandFailure(error: string): ToolResult {
  return {
    output: '',
    error,
    succeeded: false,
    interrupted: false,
  };
}

export class ToolDispatchEngine {
  private readonly port: DebuggerCommandPort;
  private readonly lane: DispatchLane;
  private interruptRequested = false;
  private inFlight = false;

  constructor(port: DebuggerCommandPort, lane: DispatchLane = new DispatchLane()) {
    this.port = port;
    this.lane = lane;
  }

  /**
   * Run one tool call against the debugger and wrap the outcome.
   * @throws DispatchError when the debugger port itself is unusable
   */
  async dispatch(toolCall: ToolCall): Promise<ToolResult> {
    if (this.interruptRequested) {
      return refusedResult();
    }

    if (toolCall.name !== DEBUGGER_COMMAND_TOOL) {
      return commandFailure(`Unknown tool "${toolCall.name}". Available: ${DEBUGGER_COMMAND_TOOL}`);
    }

    const parsed = parseCommandArgument(toolCall.arguments);
    if (!parsed.ok) {
      return commandFailure(parsed.error);
    }

    return this.lane.run(async () => {
      // The latch may have been raised while this call was queued
      if (this.interruptRequested) {
        return refusedResult();
      }

      logger.toolInput(toolCall.name, toolCall.arguments);
      const startTime = Date.now();
      const output = await this.executeInLane(parsed.command);
      const duration = (Date.now() - startTime) / 1000;
      logger.toolOutput(parsed.command, output.succeeded ? output.output : output.error, duration, !output.succeeded);

      return {
        output: output.output,
        error: output.error,
        succeeded: output.succeeded,
        interrupted: this.interruptRequested,
      };
    });
  }

  /**
   * Run a raw command through the lane, outside of any agent run (e.g. loading
   * the target before the first question). Ignores the interrupt latch.
   * @throws DispatchError when the debugger port itself is unusable
   */
  async runCommand(command: string): Promise<CommandOutput> {
    return this.lane.run(() => this.executeInLane(command));
  }

  /**
   * Ask the port for the identity of the loaded target.
   * @throws DispatchError when the debugger port itself is unusable
   */
  async getTargetIdentity(): Promise<TargetIdentity> {
    return this.lane.run(async () => {
      try {
        return await this.port.getTargetIdentity();
      } catch (error) {
        throw new DispatchError(`Debugger unavailable: ${getErrorMessage(error)}`, { cause: error });
      }
    });
  }

  /**
   * Raise the interrupt latch. Idempotent; safe to call from signal and
   * keypress handlers. A command in flight is nudged via the port's
   * interrupt(), but is not waited on here.
   */
  requestInterrupt(): void {
    if (this.interruptRequested) return;

    this.interruptRequested = true;
    logger.debug('Interrupt requested');

    if (this.inFlight) {
      try {
        this.port.interrupt();
      } catch (error) {
        logger.warn(`Debugger interrupt failed: ${getErrorMessage(error)}`);
      }
    }
  }

  isInterrupted(): boolean {
    return this.interruptRequested;
  }

  /**
   * Lower the latch. Called at the start of every agent run.
   */
  resetInterrupt(): void {
    this.interruptRequested = false;
  }

  /**
   * Must only be called while holding the lane.
   */
  private async executeInLane(command: string): Promise<CommandOutput> {
    this.inFlight = true;
    try {
      return await this.port.execute(command);
    } catch (error) {
      throw new DispatchError(`Debugger unavailable: ${getErrorMessage(error)}`, { cause: error });
    } finally {
      this.inFlight = false;
    }
  }
}
