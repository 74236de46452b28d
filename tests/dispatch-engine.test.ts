// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ToolDispatchEngine } from '../src/dispatch/engine.js';
import { DispatchError } from '../src/errors.js';
import { deriveTargetIdentity } from '../src/debugger/identity.js';
import type { ToolCall } from '../src/types.js';
import { FakeDebuggerPort } from './helpers/fake-port.js';

function commandCall(command: string, id = `call_${command}`): ToolCall {
  return { id, name: 'execute_debugger_command', arguments: { command } };
}

describe('ToolDispatchEngine', () => {
  let port: FakeDebuggerPort;
  let engine: ToolDispatchEngine;

  beforeEach(() => {
    port = new FakeDebuggerPort();
    engine = new ToolDispatchEngine(port);
  });

  describe('dispatch', () => {
    it('runs the command and wraps the debugger output', async () => {
      port.respond('bt', { output: '* frame #0: main' });

      const result = await engine.dispatch(commandCall('bt'));

      expect(result).toEqual({ output: '* frame #0: main', error: '', succeeded: true, interrupted: false });
      expect(port.commands).toEqual(['bt']);
    });

    it('returns a rejected command as data', async () => {
      port.respond('frame variable nope', {
        error: "error: no variable named 'nope' found in this frame",
        succeeded: false,
      });

      const result = await engine.dispatch(commandCall('frame variable nope'));

      expect(result).toEqual({
        output: '',
        error: "error: no variable named 'nope' found in this frame",
        succeeded: false,
        interrupted: false,
      });
    });

    it('reports an unknown tool without touching the debugger', async () => {
      const result = await engine.dispatch({ id: 'c1', name: 'shell', arguments: { command: 'ls' } });

      expect(result).toEqual({
        output: '',
        error: 'Unknown tool "shell". Available: execute_debugger_command',
        succeeded: false,
        interrupted: false,
      });
      expect(port.commands).toEqual([]);
    });

    it('reports a missing or empty command argument', async () => {
      const missing = await engine.dispatch({ id: 'c1', name: 'execute_debugger_command', arguments: {} });
      const empty = await engine.dispatch(commandCall('   '));

      expect(missing.error).toBe('Missing required argument "command" (string)');
      expect(empty.error).toBe('Argument "command" must not be empty');
      expect(port.commands).toEqual([]);
    });

    it('runs concurrent dispatches one at a time in arrival order', async () => {
      const results = await Promise.all([
        engine.dispatch(commandCall('thread list')),
        engine.dispatch(commandCall('bt')),
        engine.dispatch(commandCall('register read')),
      ]);

      expect(port.maxConcurrent).toBe(1);
      expect(port.commands).toEqual(['thread list', 'bt', 'register read']);
      expect(results.map((r) => r.output)).toEqual(['ran thread list', 'ran bt', 'ran register read']);
    });

    it('throws DispatchError when the debugger itself fails, and frees the lane', async () => {
      port.failWith = new Error('lldb exited (code 1)');

      const failed = engine.dispatch(commandCall('bt'));
      await expect(failed).rejects.toBeInstanceOf(DispatchError);
      await expect(engine.dispatch(commandCall('bt'))).rejects.toThrow('Debugger unavailable: lldb exited (code 1)');

      port.failWith = null;
      const result = await engine.dispatch(commandCall('bt'));
      expect(result.succeeded).toBe(true);
    });
  });

  describe('interrupt latch', () => {
    it('refuses new commands once raised', async () => {
      engine.requestInterrupt();

      const result = await engine.dispatch(commandCall('bt'));

      expect(result).toEqual({
        output: '',
        error: 'Interrupted before execution',
        succeeded: false,
        interrupted: true,
      });
      expect(port.commands).toEqual([]);
      // Nothing was in flight to nudge
      expect(port.interruptCount).toBe(0);
    });

    it('lets a command in flight finish and marks it interrupted', async () => {
      port.respond('continue', { output: 'Process 42 resuming' });
      port.onExecute = () => engine.requestInterrupt();

      const result = await engine.dispatch(commandCall('continue'));

      expect(result).toEqual({ output: 'Process 42 resuming', error: '', succeeded: true, interrupted: true });
      expect(port.interruptCount).toBe(1);
    });

    it('refuses a queued command when the latch rises while it waits', async () => {
      const release = port.hold();
      const first = engine.dispatch(commandCall('continue'));
      const second = engine.dispatch(commandCall('bt'));

      await vi.waitFor(() => expect(port.commands).toEqual(['continue']));
      engine.requestInterrupt();
      release();

      expect((await first).interrupted).toBe(true);
      expect(await second).toEqual({
        output: '',
        error: 'Interrupted before execution',
        succeeded: false,
        interrupted: true,
      });
      expect(port.commands).toEqual(['continue']);
    });

    it('nudges the debugger only once per raise', async () => {
      const release = port.hold();
      const pending = engine.dispatch(commandCall('continue'));
      await vi.waitFor(() => expect(port.commands).toHaveLength(1));

      engine.requestInterrupt();
      engine.requestInterrupt();
      release();
      await pending;

      expect(port.interruptCount).toBe(1);
      expect(engine.isInterrupted()).toBe(true);
    });

    it('is lowered by resetInterrupt', async () => {
      engine.requestInterrupt();
      engine.resetInterrupt();

      expect(engine.isInterrupted()).toBe(false);
      expect((await engine.dispatch(commandCall('bt'))).interrupted).toBe(false);
    });
  });

  describe('runCommand', () => {
    it('runs through the lane even while the latch is raised', async () => {
      port.respond('target create "/tmp/a.out"', { output: "Current executable set to '/tmp/a.out' (x86_64)." });
      engine.requestInterrupt();

      const output = await engine.runCommand('target create "/tmp/a.out"');

      expect(output.output).toBe("Current executable set to '/tmp/a.out' (x86_64).");
      expect(port.commands).toEqual(['target create "/tmp/a.out"']);
    });
  });

  describe('getTargetIdentity', () => {
    it('returns the identity reported by the port', async () => {
      port.identity = deriveTargetIdentity('/tmp/a.out', 'x86_64');
      await expect(engine.getTargetIdentity()).resolves.toEqual(port.identity);
    });

    it('wraps port failures in DispatchError', async () => {
      port.failWith = new Error('broken pipe');
      await expect(engine.getTargetIdentity()).rejects.toThrow('Debugger unavailable: broken pipe');
    });
  });
});
