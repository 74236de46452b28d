// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types shared across the dispatch engine, stores and agent loop.
 *
 * Command failures reported by the debugger are not errors here: they travel
 * as data in a ToolResult. These classes cover the failures that abort a run.
 */

/**
 * Error categories for classification at the agent loop boundary.
 */
export enum ErrorCategory {
  DISPATCH = 'dispatch',
  CONFIGURATION = 'configuration',
  AGENT = 'agent',
  STORAGE = 'storage',
  SETTINGS = 'settings',
}

/**
 * Base class for all dbgmate errors.
 */
export class DbgmateError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DbgmateError';
  }
}

/**
 * The debugger command port itself is unusable (process gone, never started,
 * stream closed). Distinct from a command the debugger rejected.
 */
export class DispatchError extends DbgmateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.DISPATCH, options);
    this.name = 'DispatchError';
  }
}

/**
 * Raised by a debugger port when its transport fails.
 */
export class DebuggerUnavailableError extends DbgmateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.DISPATCH, options);
    this.name = 'DebuggerUnavailableError';
  }
}

/**
 * The hosted agent cannot be used: no provider selected, missing credentials,
 * or rejected authentication.
 */
export class ConfigurationError extends DbgmateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.CONFIGURATION, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A transcript could not be read or written.
 */
export class StorageError extends DbgmateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.STORAGE, options);
    this.name = 'StorageError';
  }
}

/**
 * The settings file is malformed, or a settings mutation was rejected.
 */
export class SettingsError extends DbgmateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.SETTINGS, options);
    this.name = 'SettingsError';
  }
}

/**
 * Normalize a thrown value to a message string.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check whether a provider error is an authentication/authorization failure.
 * Both SDKs expose the HTTP status as `status` on their API errors.
 */
export function isAuthenticationFailure(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return false;
  }
  const status = error.status;
  return status === 401 || status === 403;
}
