import type { Board } from '../Board.ts';
import type { Strategy } from './Strategy.ts';

/**
 * Removes the digit of every solved cell from the candidates of all its peers.
 */
export class EliminationStrategy implements Strategy {
  public readonly name = 'Elimination';

  public apply(board: Board): Board {
    const solvedCells = board.topology.cells.filter((cell) => board.get(cell).isSolved);
    for (const cell of solvedCells) {
      // Empty by now if an earlier peer update removed its digit.
      const digit = board.get(cell);
      for (const peer of board.topology.getPeers(cell)) {
        board.assign(peer, board.get(peer).without(digit));
      }
    }
    return board;
  }
}
