import type { Strategy } from './strategies/Strategy.ts';

import { AssignmentTrace } from './AssignmentTrace.ts';
import { Board } from './Board.ts';
import { parseGrid } from './parsers.ts';
import { search } from './search.ts';
import { createDefaultStrategies } from './strategies/createDefaultStrategies.ts';
import { Topology } from './Topology.ts';

export interface SolveResult {
  readonly searchNodes: number;
  /**
   * Fully solved board, or `null` when the puzzle has no solution.
   */
  readonly solution: Board | null;
  readonly trace: AssignmentTrace;
}

export interface SolverOptions {
  readonly isDiagonal?: boolean;
  /**
   * Upper bound on search nodes; exceeding it throws. Unbounded by default.
   */
  readonly maxSearchNodes?: number;
  /**
   * When `false`, nothing is recorded and the result carries an empty trace. Defaults to `true`.
   */
  readonly recordTrace?: boolean;
  readonly strategies?: readonly Strategy[];
}

export class Solver {
  public readonly strategies: readonly Strategy[];
  public readonly topology: Topology;
  private readonly maxSearchNodes: number;
  private readonly recordTrace: boolean;

  public constructor(options: SolverOptions = {}) {
    this.strategies = options.strategies ?? createDefaultStrategies();
    this.topology = new Topology(options.isDiagonal ?? false);
    this.maxSearchNodes = options.maxSearchNodes ?? Infinity;
    this.recordTrace = options.recordTrace ?? true;
  }

  /**
   * Solves an 81-character grid. Each call gets its own trace.
   */
  public solve(grid: string): SolveResult {
    const trace = this.recordTrace ? new AssignmentTrace() : null;
    const board = Board.fromValues(this.topology, parseGrid(grid, this.topology), trace);
    return this.solveBoard(board);
  }

  public solveBoard(board: Board): SolveResult {
    if (board.topology !== this.topology) {
      throw new Error('Board was built for a different topology');
    }
    const budget = { maxNodes: this.maxSearchNodes, nodes: 0 };
    const solution = search(board, this.strategies, budget);
    return {
      searchNodes: budget.nodes,
      solution,
      trace: board.trace ?? new AssignmentTrace()
    };
  }
}
