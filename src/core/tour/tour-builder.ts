/**
 * Greedy tour construction (Warnsdorff's rule).
 *
 * From the current cell, every legal candidate is scored by its degree:
 * the number of legal moves available from it on the board as it stands.
 * The candidate with the strictly smallest degree wins; on a tie the
 * first one in catalog order is kept. There is no backtracking: when no
 * legal candidate remains the attempt ends, complete or not.
 */

import type { BoardView, Cell, NextCellSelection, Offset, TourResult, TourStep } from '../models/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { Board, DEFAULT_UNVISITED_MARKER, assertValidDimension, assertValidMarker } from './board.js';
import { InvalidTourArgumentError } from './errors.js';
import { cell, moves, translate } from './move-catalog.js';

const log = createLogger('tour');

export interface BuildTourOptions {
  /** Marker for unvisited cells (default 0, must be <= 0) */
  unvisitedMarker?: number;
  /** Called after each cell is marked, including the start cell */
  onStep?: (step: TourStep) => void;
}

/** Legal cells reachable in one move from `from`, in catalog order */
export function legalCandidates(board: Board, from: Cell, catalog: readonly Offset[] = moves()): Cell[] {
  const candidates: Cell[] = [];
  for (const offset of catalog) {
    const candidate = translate(from, offset);
    if (board.isLegal(candidate)) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

/** Number of legal moves available from `from` */
export function degreeOf(board: Board, from: Cell, catalog: readonly Offset[] = moves()): number {
  let degree = 0;
  for (const offset of catalog) {
    if (board.isLegal(translate(from, offset))) {
      degree++;
    }
  }
  return degree;
}

/** Pick the legal candidate with the lowest degree; first in catalog order wins ties */
export function selectNextCell(board: Board, from: Cell, catalog: readonly Offset[] = moves()): NextCellSelection {
  let selection: NextCellSelection = { kind: 'none' };

  for (const candidate of legalCandidates(board, from, catalog)) {
    const degree = degreeOf(board, candidate, catalog);
    if (selection.kind === 'none' || degree < selection.degree) {
      selection = { kind: 'found', cell: candidate, degree };
    }
  }

  return selection;
}

function assertValidStart(dimension: number, start: Cell): void {
  const inRange = (value: number): boolean => Number.isSafeInteger(value) && value >= 0 && value < dimension;
  if (!inRange(start.row) || !inRange(start.col)) {
    throw new InvalidTourArgumentError(
      'INVALID_START',
      `Start [row:${start.row}, column:${start.col}] must lie within 0..${dimension - 1} on both axes`,
      { row: start.row, col: start.col, dimension },
    );
  }
}

/**
 * Build one tour attempt from `start`.
 *
 * Deterministic: the same dimension and start always produce the same
 * path. Failing to cover the board is a normal result (`success: false`).
 */
export function buildTour(dimension: number, start: Cell, options: BuildTourOptions = {}): TourResult {
  const unvisitedMarker = options.unvisitedMarker ?? DEFAULT_UNVISITED_MARKER;
  assertValidDimension(dimension);
  assertValidMarker(unvisitedMarker);
  assertValidStart(dimension, start);

  const catalog = moves();
  const board = new Board(dimension, unvisitedMarker);
  const origin = cell(start.row, start.col);
  const path: Cell[] = [];

  // Observers read markers through this view; only the builder marks cells
  const view: BoardView = Object.freeze({
    dimension,
    unvisitedMarker,
    markerAt: (target: Cell) => board.markerAt(target),
    toRows: () => board.toRows(),
  });

  const visit = (next: Cell, step: number): void => {
    board.mark(next, step);
    path.push(next);
    options.onStep?.({ step, cell: next, board: view });
  };

  let step = 1;
  let current = origin;
  visit(current, step);

  while (step < board.cellCount) {
    const selection = selectNextCell(board, current, catalog);
    if (selection.kind === 'none') {
      break;
    }
    step++;
    current = selection.cell;
    visit(current, step);
  }

  const success = step === board.cellCount;
  log.debug('Tour attempt finished', { dimension, start: origin, visited: step, success });

  return {
    dimension,
    start: origin,
    path,
    success,
    markers: board.toRows(),
  };
}
