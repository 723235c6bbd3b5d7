import type { Board } from '../Board.ts';
import type { Candidates } from '../Candidates.ts';
import type {
  CellId,
  Unit
} from '../Topology.ts';
import type { Strategy } from './Strategy.ts';

const TWIN_SIZE = 2;

interface NakedTwins {
  readonly cells: readonly CellId[];
  readonly digits: Candidates;
}

/**
 * Two cells of a unit holding the same two candidates own those digits; every other
 * cell of the unit loses them.
 *
 * All twin pairs of a unit are collected before any elimination in that unit. When
 * three or more cells share the same two candidates, every pair among them is used,
 * which empties the extra cells and surfaces the contradiction.
 */
export class NakedTwinsStrategy implements Strategy {
  public readonly name = 'Naked twins';

  public apply(board: Board): Board {
    for (const unit of board.topology.units) {
      for (const twins of this.findTwins(board, unit)) {
        for (const cell of unit.cells) {
          if (!twins.cells.includes(cell)) {
            board.assign(cell, board.get(cell).without(twins.digits));
          }
        }
      }
    }
    return board;
  }

  private findTwins(board: Board, unit: Unit): NakedTwins[] {
    const bivalueCells = unit.cells.filter((cell) => board.get(cell).size === TWIN_SIZE);
    const result: NakedTwins[] = [];
    bivalueCells.forEach((firstCell, index) => {
      const digits = board.get(firstCell);
      for (const secondCell of bivalueCells.slice(index + 1)) {
        if (board.get(secondCell).equals(digits)) {
          result.push({ cells: [firstCell, secondCell], digits });
        }
      }
    });
    return result;
  }
}
