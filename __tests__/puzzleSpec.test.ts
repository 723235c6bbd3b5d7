import { readFileSync } from 'node:fs';
import {
  describe,
  expect,
  it
} from 'vitest';

import { parsePuzzleSpec } from '../src/puzzleSpec.ts';
import { Solver } from '../src/Solver.ts';
import { isValidSolution } from '../src/validation.ts';
import { DIAGONAL_GRID } from './boardTestHelper.ts';

describe('parsePuzzleSpec', () => {
  it('reads a multi-line grid with title and diagonal flag', () => {
    const content = [
      'title: Diagonal classic',
      'diagonal: true',
      'grid: |',
      ...(DIAGONAL_GRID.match(/.{9}/g) ?? []).map((row) => `  ${row}`)
    ].join('\n');

    expect(parsePuzzleSpec(content, 'classic')).toEqual({
      grid: DIAGONAL_GRID,
      isDiagonal: true,
      title: 'Diagonal classic'
    });
  });

  it('defaults to standard mode and a title from the file name', () => {
    const spec = parsePuzzleSpec(`grid: '${DIAGONAL_GRID}'`, 'easy');
    expect(spec.isDiagonal).toBe(false);
    expect(spec.title).toBe('Sudoku easy');
  });

  it('rejects documents that are not mappings', () => {
    expect(() => parsePuzzleSpec('just text', 'x')).toThrow('YAML spec must be a mapping');
    expect(() => parsePuzzleSpec('- a\n- b', 'x')).toThrow('YAML spec must be a mapping');
  });

  it('names the offending field', () => {
    expect(() => parsePuzzleSpec('title: Missing grid', 'x')).toThrow('grid is required in YAML spec');
    expect(() => parsePuzzleSpec('grid: 5', 'x')).toThrow('grid must be a string');
    expect(() => parsePuzzleSpec(`grid: '${DIAGONAL_GRID}'\ndiagonal: yes`, 'x')).toThrow('diagonal must be a boolean');
    expect(() => parsePuzzleSpec(`grid: '${DIAGONAL_GRID}'\ntitle: [a]`, 'x')).toThrow('title must be a string');
  });

  it('loads the bundled puzzle files', () => {
    for (const file of ['diagonal-classic', 'shifted-rows']) {
      const content = readFileSync(new URL(`../puzzles/${file}.yaml`, import.meta.url), 'utf-8');
      const spec = parsePuzzleSpec(content, file);
      const { solution } = new Solver({ isDiagonal: spec.isDiagonal }).solve(spec.grid);
      expect(solution && isValidSolution(solution)).toBe(true);
    }
  });
});
