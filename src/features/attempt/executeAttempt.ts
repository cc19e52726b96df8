/**
 * Attempt command: one deterministic tour attempt from a given start.
 */

import type { Cell, GlobalConfig } from '../../core/models/index.js';
import { buildTour } from '../../core/tour/index.js';
import { isQuietMode } from '../../shared/context.js';
import { EXIT_SUCCESS, EXIT_TOUR_NOT_FOUND } from '../../shared/exitCodes.js';
import {
  blankLine,
  formatCell,
  formatPath,
  print,
  renderBoard,
  status,
} from '../../shared/ui/index.js';

export function executeAttempt(config: GlobalConfig, start: Cell): number {
  const json = config.output === 'json';
  const showSteps = config.showSteps && !json && !isQuietMode();

  const result = buildTour(config.dimension, start, {
    unvisitedMarker: config.unvisitedMarker,
    onStep: showSteps
      ? (step) => {
          print(`Step: ${step.step}`);
          blankLine();
          renderBoard(step.board.toRows());
          blankLine();
        }
      : undefined,
  });

  if (json) {
    print(JSON.stringify(result, null, 2));
  } else {
    const cellCount = config.dimension * config.dimension;
    status('Start', formatCell(result.start));
    status('Visited', `${result.path.length}/${cellCount}`, result.success ? 'green' : 'red');
    if (!showSteps) {
      blankLine();
      renderBoard(result.markers);
      blankLine();
    }
    if (!isQuietMode()) {
      status('Path', formatPath(result.path));
    }
  }

  return result.success ? EXIT_SUCCESS : EXIT_TOUR_NOT_FOUND;
}
