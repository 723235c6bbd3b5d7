import type { Board } from './Board.ts';
import type { Strategy } from './strategies/Strategy.ts';

/**
 * Applies the strategies in order, pass after pass, until a pass removes no candidate.
 * Candidates only ever shrink, so an unchanged count also means no cell was solved.
 *
 * Returns `null` as soon as a pass leaves some cell without candidates. Otherwise
 * returns the same board, solved or not; reducing it again changes nothing.
 */
export function reducePuzzle(board: Board, strategies: readonly Strategy[]): Board | null {
  let stalled = false;
  while (!stalled) {
    const candidatesBefore = board.candidateCount;
    for (const strategy of strategies) {
      strategy.apply(board);
    }
    if (board.hasContradiction) {
      return null;
    }
    stalled = board.candidateCount === candidatesBefore;
  }
  return board;
}
