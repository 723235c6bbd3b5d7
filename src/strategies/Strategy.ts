import type { Board } from '../Board.ts';

/**
 * A propagation technique. Mutates the board through {@link Board.assign} only.
 */
export interface Strategy {
  apply(board: Board): Board;
  readonly name: string;
}
