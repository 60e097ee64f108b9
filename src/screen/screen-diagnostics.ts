/**
 * Per-buffer record of the silent recoveries the screen model performs.
 * Terminal operations never throw, so this log is the only trace that
 * malformed input leaves behind.
 */

export type PaletteOp = 'set_entry' | 'set_entry_color';

/** Detail carried by each recovery event. */
export interface ScreenRecoveryDetails {
  combining_mark_dropped: { mark: string };
  scrollback_evicted: { maxScrollback: number };
  palette_missing: { op: PaletteOp; palette: number };
  palette_index_out_of_range: { op: PaletteOp; palette: number; index: number };
  palette_unknown_code: { palette: number; code: number };
  glyph_pixels_misaligned: { glyph: string; pixels: number; width: number };
}

export type ScreenRecoveryEvent = keyof ScreenRecoveryDetails;

type LastRecoveries = { [E in ScreenRecoveryEvent]?: ScreenRecoveryDetails[E] };

export class ScreenRecoveryLog {
  private counts = new Map<ScreenRecoveryEvent, number>();
  private last: LastRecoveries = {};

  record<E extends ScreenRecoveryEvent>(event: E, detail: ScreenRecoveryDetails[E]): void {
    this.counts.set(event, (this.counts.get(event) ?? 0) + 1);
    this.last[event] = detail;
  }

  count(event: ScreenRecoveryEvent): number {
    return this.counts.get(event) ?? 0;
  }

  lastDetail<E extends ScreenRecoveryEvent>(event: E): ScreenRecoveryDetails[E] | undefined {
    return this.last[event];
  }

  /** Events seen so far with their counts. */
  snapshot(): Partial<Record<ScreenRecoveryEvent, number>> {
    const out: Partial<Record<ScreenRecoveryEvent, number>> = {};
    for (const [event, n] of this.counts) out[event] = n;
    return out;
  }

  clear(): void {
    this.counts.clear();
    this.last = {};
  }
}
