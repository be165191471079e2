import type { ThemeFont } from "./theme";

export interface TableColumnSpec {
  header: string;
  /** Relative width; ratios are normalized across the table's columns. */
  widthRatio: number;
  /** Cell font; the theme's body font when unset. */
  font?: ThemeFont;
}

export const MIN_COLUMN_WIDTH = 30;
export const CELL_PADDING = 2;

/**
 * Splits `available` across columns in proportion to `ratios`. A column
 * whose share falls under `minWidth` is pinned there and the others share
 * what is left. When even the floors do not fit, every column gets
 * `minWidth`.
 */
export function columnWidths(
  ratios: readonly number[],
  available: number,
  minWidth = MIN_COLUMN_WIDTH
): number[] {
  const n = ratios.length;
  if (n === 0) return [];

  let weights = ratios.map((r) => (Number.isFinite(r) && r > 0 ? r : 0));
  if (weights.every((w) => w === 0)) weights = weights.map(() => 1);

  const pinned = new Set<number>();
  for (;;) {
    const free = available - pinned.size * minWidth;
    const open = weights.map((_, i) => i).filter((i) => !pinned.has(i));
    const openWeight = open.reduce((sum, i) => sum + weights[i], 0);
    const share = (i: number) =>
      openWeight > 0 ? (free * weights[i]) / openWeight : free / open.length;

    const under = open.filter((i) => share(i) < minWidth);
    if (under.length === 0) {
      return weights.map((_, i) => (pinned.has(i) ? minWidth : share(i)));
    }
    for (const i of under) pinned.add(i);
    if (pinned.size === n) return weights.map(() => minWidth);
  }
}

/** Left edge of each column, starting at `left`. */
export function columnOffsets(left: number, widths: readonly number[], gap: number): number[] {
  const offsets: number[] = [];
  let x = left;
  for (const w of widths) {
    offsets.push(x);
    x += w + gap;
  }
  return offsets;
}
