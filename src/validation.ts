import type { Board } from './Board.ts';
import type { Unit } from './Topology.ts';

import { DIGITS } from './Candidates.ts';

/**
 * First unit, in topology order, whose cells do not hold each digit exactly once.
 * An unsolved cell breaks every unit it belongs to.
 */
export function findBrokenUnit(board: Board): Unit | null {
  for (const unit of board.topology.units) {
    const seen = new Set(unit.cells.map((cell) => board.get(cell).value));
    if (seen.size !== DIGITS.length || DIGITS.some((digit) => !seen.has(digit))) {
      return unit;
    }
  }
  return null;
}

/**
 * Whether every cell is solved and every unit of the board's topology holds each digit once.
 */
export function isValidSolution(board: Board): boolean {
  return board.isSolved && findBrokenUnit(board) === null;
}
