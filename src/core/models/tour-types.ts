/**
 * Board and tour value types
 */

/** Relative displacement applied to a cell. `dx` moves rows, `dy` moves columns. */
export interface Offset {
  readonly dx: number;
  readonly dy: number;
}

/** Absolute board position */
export interface Cell {
  readonly row: number;
  readonly col: number;
}

/** Read-only view of a board's visit markers */
export interface BoardView {
  readonly dimension: number;
  readonly unvisitedMarker: number;
  markerAt(cell: Cell): number;
  toRows(): number[][];
}

/** Emitted after a cell has been marked visited */
export interface TourStep {
  /** 1-based step number; equals the marker written to the cell */
  step: number;
  cell: Cell;
  board: BoardView;
}

/** Outcome of a single greedy attempt */
export interface TourResult {
  dimension: number;
  start: Cell;
  /** Visited cells in order; index = step number - 1 */
  path: Cell[];
  /** True when every cell of the board was visited */
  success: boolean;
  /** Final marker grid, row-major */
  markers: number[][];
}

/** Next-cell selection: either a chosen candidate or no legal move */
export type NextCellSelection =
  | { kind: 'found'; cell: Cell; degree: number }
  | { kind: 'none' };

/** Per-attempt summary kept by the search driver */
export interface AttemptSummary {
  attempt: number;
  start: Cell;
  visited: number;
  success: boolean;
}

/** Outcome of a retrying search */
export interface TourSearchResult {
  found: boolean;
  dimension: number;
  attempts: number;
  maxAttempts: number;
  /** The successful attempt, if any */
  tour?: TourResult;
  /** The last attempt made (successful or not) */
  lastAttempt?: TourResult;
  history: AttemptSummary[];
  elapsedMs: number;
}
