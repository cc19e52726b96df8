/**
 * Search command: retry random starts until a tour covers the board.
 */

import type { GlobalConfig, TourResult, TourSearchResult } from '../../core/models/index.js';
import {
  TourSearch,
  createDefaultRandomSource,
  createSeededRandomSource,
  type RandomSource,
} from '../../core/search/index.js';
import { isQuietMode } from '../../shared/context.js';
import { EXIT_SUCCESS, EXIT_TOUR_NOT_FOUND } from '../../shared/exitCodes.js';
import {
  blankLine,
  debug,
  error,
  formatCell,
  formatPath,
  info,
  print,
  renderBoard,
  status,
  success,
  warn,
} from '../../shared/ui/index.js';
import { createLogger } from '../../shared/utils/debug.js';

const log = createLogger('search-command');

export interface ExecuteSearchOptions {
  /** Start-cell source; defaults to a seeded source when config.seed is set */
  random?: RandomSource;
  now?: () => number;
}

function selectRandomSource(config: GlobalConfig, options: ExecuteSearchOptions): RandomSource {
  if (options.random) {
    return options.random;
  }
  return config.seed === undefined ? createDefaultRandomSource() : createSeededRandomSource(config.seed);
}

function printStep(step: number, rows: number[][]): void {
  print(`Step: ${step}`);
  blankLine();
  renderBoard(rows);
  blankLine();
}

function reportAttempt(result: TourResult, attempt: number, maxAttempts: number): void {
  const cellCount = result.dimension * result.dimension;
  debug(`Path: ${formatPath(result.path)}`);
  if (result.success) {
    success('Found path for pawn');
    blankLine();
    return;
  }
  warn(`Cannot find path for pawn (visited ${result.path.length}/${cellCount} cells)`);
  if (attempt < maxAttempts) {
    info('retrying...');
  }
  blankLine();
}

function reportOutcome(result: TourSearchResult, showSteps: boolean): void {
  if (result.tour) {
    if (!showSteps) {
      renderBoard(result.tour.markers);
      blankLine();
    }
    status('Start', formatCell(result.tour.start));
    status('Attempts', `${result.attempts}/${result.maxAttempts}`, 'green');
  } else {
    error(`No tour found after ${result.attempts} attempts`);
    status('Attempts', `${result.attempts}/${result.maxAttempts}`, 'red');
  }
  print(`Finished after ${result.elapsedMs}ms`);
}

/**
 * Run the search described by `config` and report it on the console.
 * Returns the process exit code.
 */
export function executeSearch(config: GlobalConfig, options: ExecuteSearchOptions = {}): number {
  const json = config.output === 'json';
  const quiet = isQuietMode() || json;
  const showSteps = config.showSteps && !quiet;

  const search = new TourSearch({
    dimension: config.dimension,
    maxAttempts: config.maxAttempts,
    unvisitedMarker: config.unvisitedMarker,
    random: selectRandomSource(config, options),
    now: options.now,
  });

  if (!quiet) {
    info(`Board dimensions are: ${config.dimension} X ${config.dimension}`);
    blankLine();
    search.on('attempt:start', (attempt, start) => {
      info(`Attempt ${attempt}/${config.maxAttempts}: the initial position for the pawn is ${formatCell(start)}`);
    });
    search.on('attempt:complete', (attempt, result) => {
      reportAttempt(result, attempt, config.maxAttempts);
    });
  }
  if (showSteps) {
    search.on('step', (_attempt, step) => {
      printStep(step.step, step.board.toRows());
    });
  }

  const result = search.run();
  log.info('Search finished', { found: result.found, attempts: result.attempts, elapsedMs: result.elapsedMs });

  if (json) {
    print(JSON.stringify(result, null, 2));
  } else {
    reportOutcome(result, showSteps);
  }

  return result.found ? EXIT_SUCCESS : EXIT_TOUR_NOT_FOUND;
}
