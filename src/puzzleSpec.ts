import yaml from 'js-yaml';

import { isRecord } from './typeGuards.ts';

export interface PuzzleSpec {
  readonly grid: string;
  readonly isDiagonal: boolean;
  readonly title: string;
}

/**
 * Reads a YAML puzzle file:
 *
 * ```yaml
 * title: Diagonal classic
 * diagonal: true
 * grid: |
 *   2........
 *   .....62..
 *   ...
 * ```
 *
 * `diagonal` defaults to `false` and `title` to `Sudoku <name>`. Whitespace inside
 * `grid` is dropped.
 */
export function parsePuzzleSpec(content: string, name: string): PuzzleSpec {
  const spec: unknown = yaml.load(content);
  if (!isRecord(spec)) {
    throw new Error('YAML spec must be a mapping');
  }

  const grid = spec['grid'];
  if (grid === undefined) {
    throw new Error('grid is required in YAML spec');
  }
  if (typeof grid !== 'string') {
    throw new Error('grid must be a string');
  }

  const diagonal = spec['diagonal'] ?? false;
  if (typeof diagonal !== 'boolean') {
    throw new Error('diagonal must be a boolean');
  }

  const titleRaw = spec['title'] ?? '';
  if (typeof titleRaw !== 'string') {
    throw new Error('title must be a string');
  }
  let title = titleRaw.trim();
  if (!title) {
    title = `Sudoku ${name}`;
  }

  return {
    grid: grid.replace(/\s+/g, ''),
    isDiagonal: diagonal,
    title
  };
}
