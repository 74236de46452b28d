// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Target identity derivation.
 *
 * The identity key selects which transcript a run loads and saves, so it must
 * be stable for one executable+arch and distinct across targets.
 */

import { createHash } from 'node:crypto';
import { basename } from 'node:path';
import type { TargetIdentity } from '../types.js';

/** Synthetic key used when no target is loaded. */
export const NO_TARGET_KEY = 'no-target';

export const NO_TARGET_IDENTITY: TargetIdentity = Object.freeze({
  key: NO_TARGET_KEY,
  executable: null,
  arch: null,
});

/**
 * Derive the identity for an executable path and architecture.
 * Key format: `<basename>-<16 hex chars of sha256(path NUL arch)>`.
 */
export function deriveTargetIdentity(executable: string, arch: string | null): TargetIdentity {
  const digest = createHash('sha256')
    .update(`${executable}\0${arch ?? ''}`)
    .digest('hex')
    .slice(0, 16);
  const base = basename(executable).replace(/[^a-zA-Z0-9_.-]/g, '_') || 'target';
  return {
    key: `${base}-${digest}`,
    executable,
    arch,
  };
}

/**
 * Identity for a key typed by the user (e.g. `reset --key`), when the
 * executable is unknown.
 */
export function identityFromKey(key: string): TargetIdentity {
  return { key, executable: null, arch: null };
}

const TARGET_LINE = /^\s*(\*)?\s*target\s+#\d+:\s+(.+?)\s+\(\s*arch=([^,\s)]+)/;

/**
 * Parse LLDB's `target list` output and return the selected target.
 * Falls back to the first listed target when none is marked with `*`.
 * Returns null when no target is loaded.
 *
 * @example
 * ```
 * Current targets:
 * * target #0: /tmp/a.out ( arch=x86_64-unknown-linux-gnu, platform=host )
 * ```
 */
export function parseTargetList(output: string): { executable: string; arch: string } | null {
  let first: { executable: string; arch: string } | null = null;

  for (const line of output.split('\n')) {
    const match = TARGET_LINE.exec(line);
    if (!match) continue;

    const entry = { executable: match[2], arch: match[3] };
    if (match[1]) {
      return entry;
    }
    first ??= entry;
  }

  return first;
}
