import type { Board } from './Board.ts';

import {
  BOX_SIZE,
  COLUMN_LABELS,
  ROW_LABELS,
  toCellId
} from './Topology.ts';

const EMPTY_CELL = '.';

/**
 * Renders the candidates of every cell as a 9x9 table with box separators.
 */
export function formatBoard(board: Board): string {
  const width = 1 + Math.max(...board.topology.cells.map((cell) => board.get(cell).size));
  const separator = Array.from({ length: BOX_SIZE }, () => '-'.repeat(width * BOX_SIZE)).join('+');

  const lines: string[] = [];
  ROW_LABELS.forEach((row, rowIndex) => {
    let line = '';
    COLUMN_LABELS.forEach((column, columnIndex) => {
      line += center(board.get(toCellId(row, column)).toString(), width);
      if (isBoxBoundary(columnIndex)) {
        line += '|';
      }
    });
    lines.push(line);
    if (isBoxBoundary(rowIndex)) {
      lines.push(separator);
    }
  });
  return lines.join('\n');
}

/**
 * Row-major 81-character grid with `.` for every cell that is not solved.
 */
export function formatGrid(board: Board): string {
  return board.topology.cells.map((cell) => board.get(cell).value ?? EMPTY_CELL).join('');
}

function center(text: string, width: number): string {
  const padding = Math.max(width - text.length, 0);
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

function isBoxBoundary(index: number): boolean {
  const position = index + 1;
  return position % BOX_SIZE === 0 && position < BOX_SIZE * BOX_SIZE;
}
