/**
 * Plain-text rendering of visit-marker boards.
 */

import type { Cell } from '../../core/models/index.js';
import { print } from './LogManager.js';

const MIN_CELL_WIDTH = 3;

/** Right-align every marker in a shared column width; one line per row */
export function formatBoardRows(rows: readonly (readonly number[])[]): string[] {
  let longest = 0;
  for (const row of rows) {
    for (const marker of row) {
      longest = Math.max(longest, String(marker).length);
    }
  }
  const width = Math.max(MIN_CELL_WIDTH, longest + 1);

  return rows.map((row) => row.map((marker) => String(marker).padStart(width)).join(''));
}

export function formatCell(cell: Cell): string {
  return `[row:${cell.row}, column:${cell.col}]`;
}

export function formatPath(path: readonly Cell[]): string {
  return path.map((cell) => `${cell.row},${cell.col}`).join(' → ');
}

export function renderBoard(rows: readonly (readonly number[])[]): void {
  for (const line of formatBoardRows(rows)) {
    print(line);
  }
}
