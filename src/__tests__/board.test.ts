/**
 * Tests for Board
 */

import { describe, it, expect } from 'vitest';
import { Board, InvalidTourArgumentError, MAX_DIMENSION, cell } from '../core/tour/index.js';
import { thrownBy } from './helpers/thrown.js';

describe('Board', () => {
  describe('construction', () => {
    it('should start with every cell unvisited', () => {
      const board = new Board(3);
      expect(board.cellCount).toBe(9);
      expect(board.toRows()).toEqual([
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ]);
    });

    it('should fill cells with a custom unvisited marker', () => {
      const board = new Board(2, -1);
      expect(board.toRows()).toEqual([
        [-1, -1],
        [-1, -1],
      ]);
      expect(board.isUnvisited(cell(1, 1))).toBe(true);
    });

    it.each([0, -3, 2.5, Number.NaN])('should reject dimension %s', (dimension) => {
      expect(() => new Board(dimension)).toThrow(InvalidTourArgumentError);
    });

    it('should reject a dimension whose cell count cannot be allocated', () => {
      const err = thrownBy(() => new Board(MAX_DIMENSION + 1));
      expect(err).toBeInstanceOf(InvalidTourArgumentError);
      expect(err).toMatchObject({
        code: 'INVALID_DIMENSION',
        message: 'Board dimension must be at most 65535, got 65536',
      });
    });

    it('should reject a positive unvisited marker', () => {
      const err = thrownBy(() => new Board(4, 1));
      expect(err).toBeInstanceOf(InvalidTourArgumentError);
      expect(err).toMatchObject({ code: 'INVALID_MARKER', context: { unvisitedMarker: 1 } });
    });
  });

  describe('bounds and legality', () => {
    const board = new Board(4);

    it('should contain cells inside [0, dimension) on both axes', () => {
      expect(board.contains(cell(0, 0))).toBe(true);
      expect(board.contains(cell(3, 3))).toBe(true);
      expect(board.contains(cell(-1, 0))).toBe(false);
      expect(board.contains(cell(0, 4))).toBe(false);
      expect(board.contains(cell(4, 2))).toBe(false);
    });

    it('should treat out-of-bounds cells as illegal without reading them', () => {
      expect(board.isLegal(cell(-3, 0))).toBe(false);
      expect(board.isLegal(cell(2, 7))).toBe(false);
    });

    it('should throw when reading a marker outside the board', () => {
      expect(() => board.markerAt(cell(4, 0))).toThrow('outside a 4x4 board');
    });
  });

  describe('mark', () => {
    it('should record the step number and make the cell illegal', () => {
      const board = new Board(4);
      board.mark(cell(1, 2), 1);

      expect(board.markerAt(cell(1, 2))).toBe(1);
      expect(board.isUnvisited(cell(1, 2))).toBe(false);
      expect(board.isLegal(cell(1, 2))).toBe(false);
      expect(board.isLegal(cell(2, 1))).toBe(true);
    });

    it('should refuse to revisit a cell', () => {
      const board = new Board(4);
      board.mark(cell(0, 0), 1);

      expect(() => board.mark(cell(0, 0), 2)).toThrow(/already visited/);
      expect(board.markerAt(cell(0, 0))).toBe(1);
    });

    it('should refuse non-positive step numbers', () => {
      const board = new Board(4);
      expect(() => board.mark(cell(0, 0), 0)).toThrow(InvalidTourArgumentError);
    });

    it('should return copies of the rows', () => {
      const board = new Board(2);
      const rows = board.toRows();
      rows[0]?.fill(9);

      expect(board.markerAt(cell(0, 0))).toBe(0);
    });
  });
});
