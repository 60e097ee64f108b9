/**
 * Small numeric helpers shared by the screen modules.
 */

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

/** Clamps a color channel into 0..255. */
export function clampChannel(value: number): number {
  return clamp(value, 0, 255);
}

export function toHex(v: number): string {
  return clampChannel(v).toString(16).padStart(2, '0');
}

/** A count of rows or cells to edit, bounded by what the edit can affect. */
export function boundedCount(n: number, max: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.min(Math.floor(n), Math.max(0, max));
}

const FNV_OFFSET_64 = 14695981039346656037n;
const FNV_PRIME_64 = 1099511628211n;

/** Incremental 64-bit FNV-1a over byte values. */
export class Fnv64 {
  private hash = FNV_OFFSET_64;

  byte(b: number): this {
    this.hash ^= BigInt(b & 0xff);
    this.hash = BigInt.asUintN(64, this.hash * FNV_PRIME_64);
    return this;
  }

  /** Feeds a 32-bit integer, little endian. */
  int(v: number): this {
    const n = v | 0;
    return this.byte(n).byte(n >>> 8).byte(n >>> 16).byte(n >>> 24);
  }

  bool(v: boolean): this {
    return this.byte(v ? 1 : 0);
  }

  digest(): bigint {
    return this.hash;
  }
}
