// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Wiring of settings, debugger, dispatch engine, transcript store and agent
 * loop for the command-line entry points.
 */

import { SettingsStore } from '../config/settings-store.js';
import { validateSettings } from '../config/validator.js';
import { LldbProcessPort, type SpawnDebugger } from '../debugger/lldb-process.js';
import { ToolDispatchEngine } from '../dispatch/engine.js';
import { FileSessionStore, type SessionStore } from '../session/store.js';
import { AgentSessionLoop } from '../agent/session-loop.js';
import { DispatchError } from '../errors.js';
import { logger } from '../logger.js';
import type { TargetIdentity } from '../types.js';

export interface TargetOptions {
  /** Executable to load with `target create` */
  target?: string;
  /** Architecture passed to `target create --arch` */
  arch?: string;
}

export interface DebugApp {
  settings: SettingsStore;
  store: SessionStore;
  port: LldbProcessPort;
  engine: ToolDispatchEngine;
  loop: AgentSessionLoop;
  close(): void;
}

/**
 * Load settings, logging any warnings about the file.
 */
export function loadSettings(settings: SettingsStore = new SettingsStore()): SettingsStore {
  for (const warning of settings.load()) {
    logger.warn(warning);
  }
  return settings;
}

/**
 * Quote a value as one LLDB command argument.
 */
export function quoteArgument(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function targetCreateCommand(options: TargetOptions & { target: string }): string {
  const arch = options.arch ? `--arch ${quoteArgument(options.arch)} ` : '';
  return `target create ${arch}${quoteArgument(options.target)}`;
}

/**
 * Start LLDB and build the run pipeline around it.
 * @throws DispatchError when LLDB cannot be started or the target fails to load
 */
export async function createDebugApp(
  options: TargetOptions & { settings?: SettingsStore; spawnProcess?: SpawnDebugger } = {}
): Promise<DebugApp> {
  const settings = options.settings ?? loadSettings();
  const config = settings.get();

  for (const warning of validateSettings(config)) {
    logger.verbose(warning);
  }

  const port = new LldbProcessPort({
    path: config.debugger.path,
    args: config.debugger.args,
    spawnProcess: options.spawnProcess,
  });
  port.start();

  const engine = new ToolDispatchEngine(port);
  const store = new FileSessionStore();
  const loop = new AgentSessionLoop({ engine, store, settings });
  const app: DebugApp = { settings, store, port, engine, loop, close: () => port.close() };

  if (options.target) {
    try {
      const result = await engine.runCommand(targetCreateCommand({ ...options, target: options.target }));
      if (!result.succeeded) {
        throw new DispatchError(`Failed to load ${options.target}: ${result.error || result.output}`);
      }
      logger.verbose(result.output);
    } catch (error) {
      app.close();
      throw error;
    }
  }

  return app;
}

/**
 * Identity of the target currently loaded in the app's debugger.
 */
export async function currentIdentity(app: DebugApp): Promise<TargetIdentity> {
  const identity = await app.engine.getTargetIdentity();
  logger.debug(`Target identity: ${identity.key}`);
  return identity;
}
