import { describe, it, expect } from 'vitest';
import { columnMatrix, columnVector, multiply, transpose } from '../src/Matrix';
import { InvalidArgumentError } from '../src/errors';

describe('Matrix', () => {
  describe('transpose', () => {
    it('swaps rows and columns of a rectangular matrix', () => {
      expect(transpose([[1, 2, 3], [4, 5, 6]])).toEqual([[1, 4], [2, 5], [3, 6]]);
    });

    it('turns a column into a row', () => {
      expect(transpose([[7], [8], [9]])).toEqual([[7, 8, 9]]);
    });

    it('does not modify its input', () => {
      const m = [[1, 2], [3, 4]];
      transpose(m);
      expect(m).toEqual([[1, 2], [3, 4]]);
    });

    it('rejects ragged input', () => {
      expect(() => transpose([[1, 2], [3]])).toThrow(InvalidArgumentError);
    });
  });

  describe('multiply', () => {
    it('multiplies compatible matrices', () => {
      const a = [[1, 2], [3, 4], [5, 6]];
      const b = [[7, 8, 9], [10, 11, 12]];
      // row 0: [1*7+2*10, 1*8+2*11, 1*9+2*12]
      expect(multiply(a, b)).toEqual([
        [27, 30, 33],
        [61, 68, 75],
        [95, 106, 117],
      ]);
    });

    it('multiplies by a column', () => {
      expect(multiply([[2, 1], [1, 3]], [[1], [3]])).toEqual([[5], [10]]);
    });

    it('forms JᵗJ from a Jacobian', () => {
      const J = [[1, 0], [1, 1], [1, 2]];
      expect(multiply(transpose(J), J)).toEqual([[3, 3], [3, 5]]);
    });

    it('throws InvalidArgumentError when inner dimensions differ', () => {
      const a = [[1, 2, 3]];
      const b = [[1], [2]];
      expect(() => multiply(a, b)).toThrow(InvalidArgumentError);
      expect(() => multiply(a, b)).toThrow('Cannot multiply 1×3 by 2×1: inner dimensions differ');
    });

    it('rejects empty operands', () => {
      expect(() => multiply([], [[1]])).toThrow(InvalidArgumentError);
    });
  });

  describe('column helpers', () => {
    it('round-trips a vector through a column matrix', () => {
      expect(columnMatrix([1, 2, 3])).toEqual([[1], [2], [3]]);
      expect(columnVector([[1], [2], [3]])).toEqual([1, 2, 3]);
    });

    it('refuses to read a multi-column matrix as a vector', () => {
      expect(() => columnVector([[1, 2]])).toThrow(InvalidArgumentError);
    });
  });
});
