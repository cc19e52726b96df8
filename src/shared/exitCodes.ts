/**
 * Process exit codes for the leaptour CLI
 *
 * Scripts can tell a rejected argument apart from a search that
 * simply ran out of attempts.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_INVALID_ARGUMENT = 2;
export const EXIT_TOUR_NOT_FOUND = 3;
