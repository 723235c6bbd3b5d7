/**
 * Solve a Sudoku puzzle described by a YAML file.
 *
 * Usage:
 *     npm run solve -- puzzles/diagonal-classic.yaml
 *     npm run solve -- puzzles/diagonal-classic.yaml --trace trace.json --max-nodes 10000
 *
 * Prints the solved board together with the number of recorded assignments and search
 * nodes. With --trace, writes every recorded assignment as JSON for a visualizer.
 */

/* eslint-disable no-console -- CLI script output. */

import {
  existsSync,
  readFileSync,
  writeFileSync
} from 'node:fs';
import {
  basename,
  extname
} from 'node:path';
import { parseArgs } from 'node:util';

import { formatBoard } from '../src/display.ts';
import { parsePuzzleSpec } from '../src/puzzleSpec.ts';
import { Solver } from '../src/Solver.ts';
import { findBrokenUnit } from '../src/validation.ts';

const JSON_INDENT = 2;
const USAGE = 'Usage: npm run solve -- <puzzle.yaml> [--trace <file.json>] [--max-nodes <n>]';

function main(): void {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      'max-nodes': { type: 'string' },
      'trace': { type: 'string' }
    }
  });

  const specPath = positionals[0];
  if (specPath === undefined) {
    console.error(USAGE);
    process.exit(1);
  }
  if (!existsSync(specPath)) {
    console.error(`Error: ${specPath} not found`);
    process.exit(1);
  }

  const maxNodesRaw = values['max-nodes'];
  const maxSearchNodes = maxNodesRaw === undefined ? Infinity : Number(maxNodesRaw);
  if (!(maxSearchNodes > 0)) {
    console.error(`Error: --max-nodes expects a positive number, got ${String(maxNodesRaw)}`);
    process.exit(1);
  }

  const spec = parsePuzzleSpec(readFileSync(specPath, 'utf-8'), basename(specPath, extname(specPath)));
  const solver = new Solver({ isDiagonal: spec.isDiagonal, maxSearchNodes });
  const { searchNodes, solution, trace } = solver.solve(spec.grid);

  console.log(`${spec.title} (${spec.isDiagonal ? 'diagonal' : 'standard'})`);
  console.log(`Strategies: ${solver.strategies.map((strategy) => strategy.name).join(', ')}`);
  if (!solution) {
    console.error(`No solution found after ${String(searchNodes)} search nodes`);
    process.exit(1);
  }
  const brokenUnit = findBrokenUnit(solution);
  if (brokenUnit) {
    throw new Error(`Solver returned a board that breaks ${brokenUnit.toString()}`);
  }

  console.log(formatBoard(solution));
  console.log(`Assignments: ${String(trace.length)}, search nodes: ${String(searchNodes)}`);

  const tracePath = values['trace'];
  if (tracePath !== undefined) {
    writeFileSync(tracePath, JSON.stringify(trace, null, JSON_INDENT), 'utf-8');
    console.log(`Trace written to ${tracePath}`);
  }
}

main();

/* eslint-enable no-console -- End CLI script output. */
