/**
 * Construction options for a screen buffer, with environment fallbacks.
 */

export type ScreenBufferOptions = {
  cols?: number;
  rows?: number;
  /** Scrollback lines retained; 0 or less keeps none. */
  maxScrollback?: number;
  /** How long keyboard activity keeps cursor-follow scrolling active. */
  autoScrollWindowMs?: number;
  /** How long a manual horizontal scroll holds off horizontal cursor-follow. */
  manualScrollCooldownMs?: number;
  /** Log palette codes that fell back to white. */
  traceUnknownInput?: boolean;
  now?: () => number;
};

export type ResolvedScreenBufferOptions = Required<ScreenBufferOptions>;

export const DEFAULT_COLS = 80;
export const DEFAULT_ROWS = 24;
export const DEFAULT_MAX_SCROLLBACK = 1000;
export const DEFAULT_AUTOSCROLL_WINDOW_MS = 500;
export const DEFAULT_MANUAL_SCROLL_COOLDOWN_MS = 5000;

function getEnvInt(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) return defaultValue;
  return Math.trunc(n);
}

function dimension(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.floor(value));
}

export function resolveScreenBufferOptions(options?: ScreenBufferOptions): ResolvedScreenBufferOptions {
  return {
    cols: dimension(options?.cols, DEFAULT_COLS),
    rows: dimension(options?.rows, DEFAULT_ROWS),
    maxScrollback: Math.max(0, Math.floor(
      options?.maxScrollback ?? getEnvInt('TILESCREEN_MAX_SCROLLBACK', DEFAULT_MAX_SCROLLBACK),
    )),
    autoScrollWindowMs: Math.max(0,
      options?.autoScrollWindowMs ?? getEnvInt('TILESCREEN_AUTOSCROLL_WINDOW_MS', DEFAULT_AUTOSCROLL_WINDOW_MS),
    ),
    manualScrollCooldownMs: Math.max(0,
      options?.manualScrollCooldownMs
        ?? getEnvInt('TILESCREEN_MANUAL_SCROLL_COOLDOWN_MS', DEFAULT_MANUAL_SCROLL_COOLDOWN_MS),
    ),
    traceUnknownInput: options?.traceUnknownInput ?? process.env.TILESCREEN_TRACE === '1',
    now: options?.now ?? Date.now,
  };
}
