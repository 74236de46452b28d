// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { TargetIdentity } from '../types.js';

/**
 * What the debugger reports for one command.
 */
export interface CommandOutput {
  output: string;
  /** Empty when the command produced no error text */
  error: string;
  succeeded: boolean;
}

/**
 * Capability wrapper around a host debugger.
 *
 * Implementations must be safe to call repeatedly and keep no state between
 * calls beyond the debugger's own session state. They are NOT required to be
 * reentrant; the dispatch engine guarantees a single caller at a time.
 *
 * A command the debugger rejects resolves with `succeeded: false`. Only a
 * transport failure (the debugger itself unusable) rejects the promise.
 */
export interface DebuggerCommandPort {
  execute(command: string): Promise<CommandOutput>;

  /**
   * Best-effort request to stop whatever the debugger is doing (for example
   * a running inferior after `continue`). May be a no-op.
   */
  interrupt(): void;

  getTargetIdentity(): Promise<TargetIdentity>;
}
