// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach } from 'vitest';
import {
  LldbProcessPort,
  cleanCommandOutput,
  sentinelCommand,
} from '../src/debugger/lldb-process.js';
import { NO_TARGET_IDENTITY, deriveTargetIdentity } from '../src/debugger/identity.js';
import { DebuggerUnavailableError } from '../src/errors.js';
import { FakeLldb } from './helpers/fake-lldb.js';

describe('sentinelCommand', () => {
  it('splits the marker across two literals', () => {
    expect(sentinelCommand('__abcd__')).toBe('script print("__ab" + "cd__")');
  });
});

describe('cleanCommandOutput', () => {
  it('drops prompt echoes, carriage returns and trailing blank lines', () => {
    expect(cleanCommandOutput('(lldb) bt\r\n* frame #0: main\r\n\n')).toBe('* frame #0: main');
  });
});

describe('LldbProcessPort', () => {
  let fake: FakeLldb;
  let spawned: Array<{ path: string; args: string[] }>;
  let port: LldbProcessPort;

  beforeEach(() => {
    fake = new FakeLldb();
    spawned = [];
    port = new LldbProcessPort({
      path: '/usr/bin/lldb-18',
      args: ['--batch'],
      spawnProcess: (path, args) => {
        spawned.push({ path, args });
        return fake;
      },
    });
  });

  it('spawns lldb without colors, once', () => {
    port.start();
    port.start();

    expect(spawned).toEqual([{ path: '/usr/bin/lldb-18', args: ['--no-use-colors', '--batch'] }]);
    expect(port.isRunning()).toBe(true);
  });

  it('rejects commands before start', async () => {
    await expect(port.execute('bt')).rejects.toThrow('/usr/bin/lldb-18 has not been started');
  });

  it('returns the output of one command', async () => {
    fake.replies.set('bt', { output: '* thread #1, stop reason = breakpoint 1.1\n  * frame #0: a.out`main at main.c:3' });
    port.start();

    const result = await port.execute('bt');

    expect(result).toEqual({
      output: '* thread #1, stop reason = breakpoint 1.1\n  * frame #0: a.out`main at main.c:3',
      error: '',
      succeeded: true,
    });
    expect(fake.received).toEqual(['bt']);
  });

  it('reports error text on stderr as a failed command', async () => {
    fake.replies.set('frame variable nope', { error: "error: no variable named 'nope' found in this frame" });
    port.start();

    const result = await port.execute('frame variable nope');

    expect(result).toEqual({
      output: '',
      error: "error: no variable named 'nope' found in this frame",
      succeeded: false,
    });
  });

  it('keeps consecutive command outputs apart', async () => {
    fake.replies.set('thread list', { output: 'Process 42 stopped' });
    fake.replies.set('register read pc', { output: 'pc = 0x0000000100003f80' });
    port.start();

    expect((await port.execute('thread list')).output).toBe('Process 42 stopped');
    expect((await port.execute('register read pc')).output).toBe('pc = 0x0000000100003f80');
  });

  it('sends a multi-line command as one line', async () => {
    port.start();
    await port.execute('expression 1 +\n2');
    expect(fake.received).toEqual(['expression 1 + 2']);
  });

  it('derives the identity from target list', async () => {
    fake.replies.set('target list', {
      output: 'Current targets:\n* target #0: /tmp/demo/a.out ( arch=x86_64-unknown-linux-gnu, platform=host )',
    });
    port.start();

    await expect(port.getTargetIdentity()).resolves.toEqual(
      deriveTargetIdentity('/tmp/demo/a.out', 'x86_64-unknown-linux-gnu')
    );
  });

  it('reports the no-target identity when nothing is loaded', async () => {
    fake.replies.set('target list', { output: 'No targets.' });
    port.start();

    await expect(port.getTargetIdentity()).resolves.toEqual(NO_TARGET_IDENTITY);
  });

  it('fails the pending command when lldb exits', async () => {
    fake.hung.add('process continue');
    port.start();

    const pending = port.execute('process continue');
    await new Promise((resolve) => setTimeout(resolve, 5));
    fake.emit('exit', 1, null);

    await expect(pending).rejects.toBeInstanceOf(DebuggerUnavailableError);
    await expect(pending).rejects.toThrow('/usr/bin/lldb-18 exited (code 1)');
    await expect(port.execute('bt')).rejects.toThrow('/usr/bin/lldb-18 is no longer running');
    expect(port.isRunning()).toBe(false);
  });

  it('sends SIGINT on interrupt', () => {
    port.start();
    port.interrupt();
    expect(fake.signals).toEqual(['SIGINT']);
  });

  it('asks lldb to quit on close', async () => {
    let written = '';
    port.start();
    fake.stdin.on('data', (chunk: string) => {
      written += chunk;
    });

    port.close();
    await new Promise((resolve) => setTimeout(resolve, 5));
    fake.emit('exit', 0, null);

    expect(written).toBe('quit\n');
    expect(port.isRunning()).toBe(false);
  });
});
