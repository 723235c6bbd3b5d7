import {
  describe,
  expect,
  it
} from 'vitest';

import { Board } from '../src/Board.ts';
import {
  formatBoard,
  formatGrid
} from '../src/display.ts';
import { parseGrid } from '../src/parsers.ts';
import { Topology } from '../src/Topology.ts';
import {
  createTestBoard,
  DIAGONAL_GRID,
  SHIFTED_ROWS_SOLUTION
} from './boardTestHelper.ts';

function boardOf(grid: string): Board {
  const topology = new Topology(false);
  return Board.fromValues(topology, parseGrid(grid, topology));
}

describe('formatBoard', () => {
  it('renders a solved board in two-character columns with box separators', () => {
    const lines = formatBoard(boardOf(SHIFTED_ROWS_SOLUTION)).split('\n');
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('1 2 3 |4 5 6 |7 8 9 ');
    expect(lines[3]).toBe('------+------+------');
    expect(lines[4]).toBe('2 3 4 |5 6 7 |8 9 1 ');
    expect(lines[7]).toBe('------+------+------');
    expect(lines[10]).toBe('9 1 2 |3 4 5 |6 7 8 ');
  });

  it('widens columns to the longest candidate list', () => {
    const lines = formatBoard(createTestBoard({ values: { A1: '5', A2: '12' } })).split('\n');
    const cell = '123456789 ';
    expect(lines[0]).toBe(`${' '.repeat(4)}5${' '.repeat(5)}${' '.repeat(4)}12${' '.repeat(4)}${cell}|${cell.repeat(3)}|${cell.repeat(3)}`);
    expect(lines[3]).toBe(`${'-'.repeat(30)}+${'-'.repeat(30)}+${'-'.repeat(30)}`);
  });
});

describe('formatGrid', () => {
  it('writes solved digits and dots for open cells', () => {
    expect(formatGrid(boardOf(DIAGONAL_GRID))).toBe(DIAGONAL_GRID);
  });

  it('writes dots for empty cells', () => {
    expect(formatGrid(createTestBoard({ values: { A1: '', A2: '4' } }))).toBe(`.4${'.'.repeat(79)}`);
  });
});
