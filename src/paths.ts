// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management for dbgmate.
 *
 * All ~/.dbgmate paths are defined here as a single source of truth.
 * Each getter computes the path at call time so tests can redirect the
 * whole tree with DBGMATE_HOME.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the base dbgmate directory.
 * Supports override via DBGMATE_HOME environment variable.
 */
export function getDbgmateHome(): string {
  if (process.env.DBGMATE_HOME) {
    return process.env.DBGMATE_HOME;
  }
  return join(homedir(), '.dbgmate');
}

/**
 * Make an identity key safe to use as a file name.
 */
export function sanitizeKey(key: string): string {
  return key.replace(/[^a-zA-Z0-9_.-]/g, '_');
}

export const DbgmatePaths = {
  /**
   * Process-wide settings record
   */
  settingsFile: (): string => join(getDbgmateHome(), 'settings.json'),

  /**
   * One transcript record per target identity
   */
  sessions: (): string => join(getDbgmateHome(), 'sessions'),
} as const;

