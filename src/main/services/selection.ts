/**
 * Cursor arithmetic over the process view.
 *
 * Selection follows position, not pid: after a rebuild the row under the
 * cursor may belong to a different process.
 */

import type { Cursor, ProcessRow, ProcessView } from '../../shared/types/monitor';

/** Advance one row, wrapping to the top past the last row. */
export function nextIndex(cursor: Cursor, length: number): Cursor {
  if (length <= 0) return cursor;
  if (cursor === null) return 0;
  return cursor >= length - 1 ? 0 : cursor + 1;
}

/** Step back one row, wrapping to the bottom from the first row. */
export function previousIndex(cursor: Cursor, length: number): Cursor {
  if (length <= 0) return cursor;
  if (cursor === null) return 0;
  return cursor <= 0 ? length - 1 : Math.min(cursor, length) - 1;
}

/**
 * Bring a cursor back in range after the view was rebuilt.
 * Empty view → null; first non-empty view → 0; shrunk view → last row.
 */
export function reconcileCursor(cursor: Cursor, length: number): Cursor {
  if (length <= 0) return null;
  if (cursor === null || cursor < 0) return 0;
  return Math.min(cursor, length - 1);
}

export function selectedRow(view: ProcessView, cursor: Cursor): ProcessRow | null {
  if (cursor === null) return null;
  return view[cursor] ?? null;
}
