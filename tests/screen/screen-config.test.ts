import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_AUTOSCROLL_WINDOW_MS,
  DEFAULT_COLS,
  DEFAULT_MANUAL_SCROLL_COOLDOWN_MS,
  DEFAULT_MAX_SCROLLBACK,
  DEFAULT_ROWS,
  resolveScreenBufferOptions,
} from '../../src/screen/screen-config.js';

const ENV_KEYS = [
  'TILESCREEN_MAX_SCROLLBACK',
  'TILESCREEN_AUTOSCROLL_WINDOW_MS',
  'TILESCREEN_MANUAL_SCROLL_COOLDOWN_MS',
  'TILESCREEN_TRACE',
] as const;

describe('resolveScreenBufferOptions', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('applies defaults', () => {
    const resolved = resolveScreenBufferOptions();
    expect(resolved).toMatchObject({
      cols: DEFAULT_COLS,
      rows: DEFAULT_ROWS,
      maxScrollback: DEFAULT_MAX_SCROLLBACK,
      autoScrollWindowMs: DEFAULT_AUTOSCROLL_WINDOW_MS,
      manualScrollCooldownMs: DEFAULT_MANUAL_SCROLL_COOLDOWN_MS,
      traceUnknownInput: false,
    });
    expect(resolved.now).toBe(Date.now);
  });

  it('reads environment fallbacks', () => {
    process.env.TILESCREEN_MAX_SCROLLBACK = '25';
    process.env.TILESCREEN_AUTOSCROLL_WINDOW_MS = '750';
    process.env.TILESCREEN_MANUAL_SCROLL_COOLDOWN_MS = '1200';
    process.env.TILESCREEN_TRACE = '1';
    expect(resolveScreenBufferOptions()).toMatchObject({
      maxScrollback: 25,
      autoScrollWindowMs: 750,
      manualScrollCooldownMs: 1200,
      traceUnknownInput: true,
    });
  });

  it('ignores malformed environment values', () => {
    process.env.TILESCREEN_MAX_SCROLLBACK = 'lots';
    process.env.TILESCREEN_TRACE = 'yes';
    expect(resolveScreenBufferOptions()).toMatchObject({
      maxScrollback: DEFAULT_MAX_SCROLLBACK,
      traceUnknownInput: false,
    });
  });

  it('prefers explicit options over the environment', () => {
    process.env.TILESCREEN_MAX_SCROLLBACK = '25';
    const now = () => 42;
    const resolved = resolveScreenBufferOptions({ maxScrollback: 7, now });
    expect(resolved.maxScrollback).toBe(7);
    expect(resolved.now).toBe(now);
  });

  it('clamps dimensions and counts', () => {
    expect(resolveScreenBufferOptions({ cols: 0, rows: 12.9, maxScrollback: -5 })).toMatchObject({
      cols: 1,
      rows: 12,
      maxScrollback: 0,
    });
    expect(resolveScreenBufferOptions({ manualScrollCooldownMs: -10 }).manualScrollCooldownMs).toBe(0);
    expect(resolveScreenBufferOptions({ cols: Number.NaN }).cols).toBe(DEFAULT_COLS);
  });
});
