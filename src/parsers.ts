import type {
  CellId,
  Topology
} from './Topology.ts';

import { Candidates } from './Candidates.ts';
import { ensureNonNullable } from './typeGuards.ts';

const EMPTY_CELL = '.';
const GRID_CELL_COUNT = 81;

/**
 * Reads an 81-character row-major grid (`1`-`9` for givens, `.` for empty cells) into
 * candidates per cell. Whitespace is ignored so grids may be split over lines.
 */
export function parseGrid(grid: string, topology: Topology): Map<CellId, Candidates> {
  const chars = grid.replace(/\s+/g, '');
  if (chars.length !== GRID_CELL_COUNT) {
    throw new Error(`Grid must have ${String(GRID_CELL_COUNT)} cells, got ${String(chars.length)}`);
  }

  const values = new Map<CellId, Candidates>();
  topology.cells.forEach((cell, index) => {
    const ch = ensureNonNullable(chars[index]);
    if (ch === EMPTY_CELL) {
      values.set(cell, Candidates.ALL);
      return;
    }
    if (!/^[1-9]$/.test(ch)) {
      throw new Error(`Bad grid character '${ch}' at ${cell}`);
    }
    values.set(cell, Candidates.parse(ch));
  });
  return values;
}
