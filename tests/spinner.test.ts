// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach } from 'vitest';

const oraSpinner = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
  succeed: vi.fn(),
  fail: vi.fn(),
}));

vi.mock('ora', () => ({
  default: vi.fn(() => {
    oraSpinner.start.mockReturnValue(oraSpinner);
    return oraSpinner;
  }),
}));

import { SpinnerManager } from '../src/spinner.js';

describe('SpinnerManager', () => {
  let spinner: SpinnerManager;

  beforeEach(() => {
    vi.clearAllMocks();
    spinner = new SpinnerManager(true);
  });

  it('does nothing when disabled', () => {
    spinner.setEnabled(false);
    spinner.thinking();

    expect(spinner.isSpinning()).toBe(false);
    expect(oraSpinner.start).not.toHaveBeenCalled();
  });

  it('starts and stops a spinner', () => {
    spinner.thinking();
    expect(spinner.isSpinning()).toBe(true);

    spinner.stop();
    expect(spinner.isSpinning()).toBe(false);
    expect(oraSpinner.stop).toHaveBeenCalledOnce();
  });

  it('stays quiet while text is streaming', () => {
    spinner.thinking();
    spinner.setStreaming(true);

    expect(spinner.isSpinning()).toBe(false);
    expect(spinner.isEnabled()).toBe(false);

    spinner.setStreaming(false);
    expect(spinner.isEnabled()).toBe(true);
  });

  it('settles a debugger command as success or failure', () => {
    spinner.toolStart('bt');
    spinner.toolSucceed('bt');
    expect(oraSpinner.succeed).toHaveBeenCalledOnce();

    spinner.toolStart('frame variable nope');
    spinner.toolFail('frame variable nope', 'no variable');
    expect(oraSpinner.fail).toHaveBeenCalledOnce();
    expect(spinner.isSpinning()).toBe(false);
  });
});
