/**
 * Random sources for picking start cells.
 *
 * The tour builder never draws random numbers itself; the search driver
 * takes one of these so runs can be reproduced from a seed or scripted
 * in tests.
 */

import type { Cell } from '../models/index.js';
import { cell } from '../tour/move-catalog.js';
import { InvalidTourArgumentError } from '../tour/errors.js';

export interface RandomSource {
  /** Integer in [0, bound) */
  nextInt(bound: number): number;
}

function assertBound(bound: number): void {
  if (!Number.isSafeInteger(bound) || bound < 1) {
    throw new InvalidTourArgumentError('INVALID_DIMENSION', `Random bound must be a positive integer, got ${bound}`, { bound });
  }
}

function fromUnitInterval(next: () => number): RandomSource {
  return {
    nextInt(bound: number): number {
      assertBound(bound);
      return Math.min(bound - 1, Math.floor(next() * bound));
    },
  };
}

// mulberry32
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createDefaultRandomSource(): RandomSource {
  return fromUnitInterval(Math.random);
}

/** Same seed, same sequence */
export function createSeededRandomSource(seed: number): RandomSource {
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidTourArgumentError('INVALID_SEED', `Seed must be an integer, got ${seed}`, { seed });
  }
  return fromUnitInterval(mulberry32(seed));
}

/** Uniform start cell; row is drawn before column */
export function randomStart(dimension: number, random: RandomSource): Cell {
  const row = random.nextInt(dimension);
  const col = random.nextInt(dimension);
  return cell(row, col);
}
