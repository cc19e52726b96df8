export { moves, cell, translate, cellsEqual, cellKey } from './move-catalog.js';
export { Board, DEFAULT_UNVISITED_MARKER, MAX_DIMENSION, assertValidDimension, assertValidMarker } from './board.js';
export {
  buildTour,
  legalCandidates,
  degreeOf,
  selectNextCell,
  type BuildTourOptions,
} from './tour-builder.js';
export {
  InvalidTourArgumentError,
  isInvalidTourArgumentError,
  type TourArgumentErrorCode,
} from './errors.js';
