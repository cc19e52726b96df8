/**
 * Retrying tour search.
 *
 * Runs greedy attempts from random start cells until one covers the
 * whole board or the attempt budget is spent. Attempts are independent:
 * each one builds on a fresh board, sharing only the move catalog.
 */

import { EventEmitter } from 'node:events';
import type { AttemptSummary, Cell, TourResult, TourSearchResult, TourStep } from '../models/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { assertValidDimension, assertValidMarker, DEFAULT_UNVISITED_MARKER } from '../tour/board.js';
import { InvalidTourArgumentError } from '../tour/errors.js';
import { buildTour } from '../tour/tour-builder.js';
import { createDefaultRandomSource, randomStart, type RandomSource } from './random-source.js';

const log = createLogger('search');

export const DEFAULT_DIMENSION = 10;
export const DEFAULT_MAX_ATTEMPTS = 100;

export interface TourSearchOptions {
  dimension?: number;
  maxAttempts?: number;
  unvisitedMarker?: number;
  random?: RandomSource;
  /** Millisecond clock used for elapsed time */
  now?: () => number;
}

export interface TourSearchEvents {
  'attempt:start': (attempt: number, start: Cell) => void;
  'step': (attempt: number, step: TourStep) => void;
  'attempt:complete': (attempt: number, result: TourResult) => void;
  'search:complete': (result: TourSearchResult) => void;
  'search:exhausted': (result: TourSearchResult) => void;
}

export interface TourSearch {
  on<K extends keyof TourSearchEvents>(event: K, listener: TourSearchEvents[K]): this;
  once<K extends keyof TourSearchEvents>(event: K, listener: TourSearchEvents[K]): this;
  off<K extends keyof TourSearchEvents>(event: K, listener: TourSearchEvents[K]): this;
  emit<K extends keyof TourSearchEvents>(event: K, ...args: Parameters<TourSearchEvents[K]>): boolean;
}

export class TourSearch extends EventEmitter {
  private readonly dimension: number;
  private readonly maxAttempts: number;
  private readonly unvisitedMarker: number;
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(options: TourSearchOptions = {}) {
    super();
    this.dimension = options.dimension ?? DEFAULT_DIMENSION;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.unvisitedMarker = options.unvisitedMarker ?? DEFAULT_UNVISITED_MARKER;
    this.random = options.random ?? createDefaultRandomSource();
    this.now = options.now ?? Date.now;

    assertValidDimension(this.dimension);
    assertValidMarker(this.unvisitedMarker);
    if (!Number.isSafeInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new InvalidTourArgumentError(
        'INVALID_ATTEMPTS',
        `Attempt budget must be a positive integer, got ${this.maxAttempts}`,
        { maxAttempts: this.maxAttempts },
      );
    }
  }

  /** Run attempts until a tour is found or the budget is spent */
  run(): TourSearchResult {
    log.enter('run', { dimension: this.dimension, maxAttempts: this.maxAttempts });
    const startedAt = this.now();
    const history: AttemptSummary[] = [];
    let tour: TourResult | undefined;
    let lastAttempt: TourResult | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts && !tour; attempt++) {
      const start = randomStart(this.dimension, this.random);
      this.emit('attempt:start', attempt, start);

      const result = buildTour(this.dimension, start, {
        unvisitedMarker: this.unvisitedMarker,
        onStep: (step) => this.emit('step', attempt, step),
      });

      history.push({ attempt, start: result.start, visited: result.path.length, success: result.success });
      lastAttempt = result;
      if (result.success) {
        tour = result;
      }
      this.emit('attempt:complete', attempt, result);
    }

    const searchResult: TourSearchResult = {
      found: tour !== undefined,
      dimension: this.dimension,
      attempts: history.length,
      maxAttempts: this.maxAttempts,
      tour,
      lastAttempt,
      history,
      elapsedMs: this.now() - startedAt,
    };

    log.exit('run', { found: searchResult.found, attempts: searchResult.attempts, elapsedMs: searchResult.elapsedMs });
    this.emit(searchResult.found ? 'search:complete' : 'search:exhausted', searchResult);
    return searchResult;
  }
}

/** Run a search without subscribing to events */
export function searchTour(options: TourSearchOptions = {}): TourSearchResult {
  return new TourSearch(options).run();
}
