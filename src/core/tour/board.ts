/**
 * Square board of visit markers.
 *
 * Cells hold the unvisited marker until visited, then the 1-based step
 * number of the visit. A cell is never reset: each attempt owns a new
 * Board.
 */

import type { BoardView, Cell } from '../models/index.js';
import { InvalidTourArgumentError } from './errors.js';

export const DEFAULT_UNVISITED_MARKER = 0;

/** Largest side whose cell count still fits in one array (2^32 - 1 elements) */
export const MAX_DIMENSION = 65535;

export function assertValidDimension(dimension: number): void {
  if (!Number.isSafeInteger(dimension) || dimension < 1) {
    throw new InvalidTourArgumentError(
      'INVALID_DIMENSION',
      `Board dimension must be a positive integer, got ${dimension}`,
      { dimension },
    );
  }
  if (dimension > MAX_DIMENSION) {
    throw new InvalidTourArgumentError(
      'INVALID_DIMENSION',
      `Board dimension must be at most ${MAX_DIMENSION}, got ${dimension}`,
      { dimension, maxDimension: MAX_DIMENSION },
    );
  }
}

export function assertValidMarker(unvisitedMarker: number): void {
  if (!Number.isSafeInteger(unvisitedMarker) || unvisitedMarker > 0) {
    throw new InvalidTourArgumentError(
      'INVALID_MARKER',
      `Unvisited marker must be an integer <= 0, got ${unvisitedMarker}`,
      { unvisitedMarker },
    );
  }
}

export class Board implements BoardView {
  readonly dimension: number;
  readonly unvisitedMarker: number;
  private readonly markers: number[];

  constructor(dimension: number, unvisitedMarker = DEFAULT_UNVISITED_MARKER) {
    assertValidDimension(dimension);
    assertValidMarker(unvisitedMarker);
    this.dimension = dimension;
    this.unvisitedMarker = unvisitedMarker;
    this.markers = new Array<number>(dimension * dimension).fill(unvisitedMarker);
  }

  get cellCount(): number {
    return this.dimension * this.dimension;
  }

  contains(cell: Cell): boolean {
    return cell.row >= 0 && cell.col >= 0 && cell.row < this.dimension && cell.col < this.dimension;
  }

  isUnvisited(cell: Cell): boolean {
    return this.markerAt(cell) === this.unvisitedMarker;
  }

  /** Inside the board and not yet visited */
  isLegal(cell: Cell): boolean {
    return this.contains(cell) && this.isUnvisited(cell);
  }

  markerAt(cell: Cell): number {
    const marker = this.markers[this.indexOf(cell)];
    if (marker === undefined) {
      throw this.outOfBounds(cell);
    }
    return marker;
  }

  mark(cell: Cell, step: number): void {
    if (!Number.isSafeInteger(step) || step < 1) {
      throw new InvalidTourArgumentError('INVALID_STEP', `Step number must be a positive integer, got ${step}`, { step });
    }
    if (!this.isUnvisited(cell)) {
      throw new InvalidTourArgumentError(
        'CELL_ALREADY_VISITED',
        `Cell [row:${cell.row}, column:${cell.col}] was already visited`,
        { row: cell.row, col: cell.col, marker: this.markerAt(cell) },
      );
    }
    this.markers[this.indexOf(cell)] = step;
  }

  /** Copy of the markers, one array per row */
  toRows(): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < this.dimension; row++) {
      rows.push(this.markers.slice(row * this.dimension, (row + 1) * this.dimension));
    }
    return rows;
  }

  private indexOf(cell: Cell): number {
    if (!this.contains(cell)) {
      throw this.outOfBounds(cell);
    }
    return cell.row * this.dimension + cell.col;
  }

  private outOfBounds(cell: Cell): InvalidTourArgumentError {
    return new InvalidTourArgumentError(
      'CELL_OUT_OF_BOUNDS',
      `Cell [row:${cell.row}, column:${cell.col}] is outside a ${this.dimension}x${this.dimension} board`,
      { row: cell.row, col: cell.col, dimension: this.dimension },
    );
  }
}
