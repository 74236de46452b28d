#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { createProgram } from './cli/program.js';
import { logger } from './logger.js';
import { getErrorMessage } from './errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    process.exitCode = 1;
  });
