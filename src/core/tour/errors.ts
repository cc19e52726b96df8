/**
 * Precondition errors raised by the tour builder and board.
 *
 * Incomplete coverage is not an error: it is reported through
 * `TourResult.success`. These errors only signal arguments the
 * caller should have rejected before calling in.
 */

export type TourArgumentErrorCode =
  | 'INVALID_DIMENSION'
  | 'INVALID_START'
  | 'INVALID_MARKER'
  | 'INVALID_STEP'
  | 'CELL_ALREADY_VISITED'
  | 'CELL_OUT_OF_BOUNDS'
  | 'INVALID_SEED'
  | 'INVALID_ATTEMPTS';

export class InvalidTourArgumentError extends Error {
  readonly code: TourArgumentErrorCode;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: TourArgumentErrorCode, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(message);
    this.name = 'InvalidTourArgumentError';
    this.code = code;
    this.context = context;
  }
}

export function isInvalidTourArgumentError(err: unknown): err is InvalidTourArgumentError {
  return err instanceof InvalidTourArgumentError;
}
