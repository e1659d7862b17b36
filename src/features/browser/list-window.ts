export interface ListWindow {
  start: number;
  end: number;
}

/**
 * The slice of a `total`-row list to show in `height` rows. The window stays
 * at `previousStart` unless it has to move for `selection` to be visible.
 */
export function visibleWindow(
  total: number,
  selection: number | null,
  height: number,
  previousStart = 0
): ListWindow {
  const rows = Math.max(1, height);
  if (total <= rows) return { start: 0, end: total };

  let start = Math.min(Math.max(previousStart, 0), total - rows);
  if (selection !== null) {
    if (selection < start) start = selection;
    if (selection >= start + rows) start = selection - rows + 1;
  }
  start = Math.min(Math.max(start, 0), total - rows);
  return { start, end: start + rows };
}
