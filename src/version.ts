// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * dbgmate version.
 * Keep this in sync with package.json version.
 */
export const VERSION = '0.1.0';
