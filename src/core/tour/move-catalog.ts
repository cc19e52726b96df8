/**
 * Leaper move catalog
 *
 * Three-cell straight leaps (N/S/E/W) and two-cell diagonal leaps
 * (NE/NW/SE/SW). The enumeration order is the tie-break order used by
 * the tour builder, so it must never change.
 */

import type { Cell, Offset } from '../models/index.js';

function offset(dx: number, dy: number): Offset {
  return Object.freeze({ dx, dy });
}

const LEAPER_MOVES: readonly Offset[] = Object.freeze([
  offset(0, 3),
  offset(-2, 2),
  offset(-3, 0),
  offset(-2, -2),
  offset(0, -3),
  offset(2, -2),
  offset(3, 0),
  offset(2, 2),
]);

/** The move catalog. Same frozen array on every call. */
export function moves(): readonly Offset[] {
  return LEAPER_MOVES;
}

export function cell(row: number, col: number): Cell {
  return Object.freeze({ row, col });
}

/** Apply an offset to a cell, producing a new cell */
export function translate(from: Cell, by: Offset): Cell {
  return cell(from.row + by.dx, from.col + by.dy);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Stable string key for set/map membership */
export function cellKey(c: Cell): string {
  return `${c.row},${c.col}`;
}
