import type { Board } from './Board.ts';
import type { Strategy } from './strategies/Strategy.ts';
import type { CellId } from './Topology.ts';

import { Candidates } from './Candidates.ts';
import { reducePuzzle } from './reducePuzzle.ts';

export interface SearchBudget {
  readonly maxNodes: number;
  nodes: number;
}

/**
 * Depth-first search over reduced boards, guessing on the unsolved cell with the fewest
 * candidates. Every guess works on its own copy of the board.
 *
 * @returns The solved board, or `null` when no assignment satisfies every unit.
 * @throws When the budget allows fewer search nodes than the puzzle needs.
 */
export function search(board: Board, strategies: readonly Strategy[], budget: SearchBudget): Board | null {
  budget.nodes++;
  if (budget.nodes > budget.maxNodes) {
    throw new Error(`Search budget of ${String(budget.maxNodes)} nodes exceeded`);
  }

  const reduced = reducePuzzle(board, strategies);
  if (!reduced) {
    return null;
  }
  if (reduced.isSolved) {
    return reduced;
  }

  const cell = selectBranchCell(reduced);
  if (!cell) {
    return null;
  }

  for (const digit of reduced.get(cell).digits) {
    const branch = reduced.copy();
    branch.assign(cell, Candidates.of(digit));
    const attempt = search(branch, strategies, budget);
    if (attempt) {
      return attempt;
    }
  }
  return null;
}

/**
 * The unsolved cell with the fewest candidates, first in row-major order on ties.
 */
export function selectBranchCell(board: Board): CellId | null {
  let best: CellId | null = null;
  let bestSize = Infinity;
  for (const cell of board.topology.cells) {
    const size = board.get(cell).size;
    if (size > 1 && size < bestSize) {
      best = cell;
      bestSize = size;
    }
  }
  return best;
}
