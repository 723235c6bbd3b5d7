import type { Board } from '../Board.ts';
import type { Digit } from '../Candidates.ts';
import type { CellId } from '../Topology.ts';
import type { Strategy } from './Strategy.ts';

import {
  Candidates,
  DIGITS
} from '../Candidates.ts';

/**
 * Assigns a digit to a cell when that cell is the only place left for it in some unit.
 */
export class OnlyChoiceStrategy implements Strategy {
  public readonly name = 'Only choice';

  public apply(board: Board): Board {
    for (const unit of board.topology.units) {
      for (const digit of DIGITS) {
        const place = this.findOnlyPlace(board, unit.cells, digit);
        if (place) {
          board.assign(place, Candidates.of(digit));
        }
      }
    }
    return board;
  }

  private findOnlyPlace(board: Board, cells: readonly CellId[], digit: Digit): CellId | null {
    let foundCell: CellId | null = null;
    let count = 0;
    for (const cell of cells) {
      if (board.get(cell).has(digit)) {
        foundCell = cell;
        count++;
      }
    }
    return count === 1 ? foundCell : null;
  }
}
