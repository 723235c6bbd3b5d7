import type { AssignmentTrace } from './AssignmentTrace.ts';
import type { Candidates } from './Candidates.ts';
import type {
  CellId,
  Topology
} from './Topology.ts';

import { ensureNonNullable } from './typeGuards.ts';

export type BoardSnapshot = ReadonlyMap<CellId, Candidates>;

/**
 * Candidate state of all 81 cells during a solve.
 *
 * {@link Board.assign} is the only mutation. Every assignment that leaves a cell
 * with a single candidate is recorded in the trace, when the board has one.
 */
export class Board {
  public get candidateCount(): number {
    let count = 0;
    for (const candidates of this.values.values()) {
      count += candidates.size;
    }
    return count;
  }

  public get hasContradiction(): boolean {
    for (const candidates of this.values.values()) {
      if (candidates.isEmpty) {
        return true;
      }
    }
    return false;
  }

  public get isSolved(): boolean {
    for (const candidates of this.values.values()) {
      if (!candidates.isSolved) {
        return false;
      }
    }
    return true;
  }

  public get solvedCount(): number {
    let count = 0;
    for (const candidates of this.values.values()) {
      if (candidates.isSolved) {
        count++;
      }
    }
    return count;
  }

  private constructor(
    public readonly topology: Topology,
    private readonly values: Map<CellId, Candidates>,
    public readonly trace: AssignmentTrace | null
  ) {
  }

  public static fromValues(topology: Topology, values: BoardSnapshot, trace: AssignmentTrace | null = null): Board {
    const ordered = new Map<CellId, Candidates>();
    for (const cell of topology.cells) {
      ordered.set(cell, ensureNonNullable(values.get(cell), `Cell ${cell} has no candidates`));
    }
    return new Board(topology, ordered, trace);
  }

  public assign(cell: CellId, value: Candidates): this {
    if (this.get(cell).equals(value)) {
      return this;
    }
    this.values.set(cell, value);
    if (this.trace && value.value !== null) {
      this.trace.record(cell, value.value, this.snapshot());
    }
    return this;
  }

  /**
   * Independent copy of the candidate state. The topology and the trace are shared.
   */
  public copy(): Board {
    return new Board(this.topology, new Map(this.values), this.trace);
  }

  public get(cell: CellId): Candidates {
    return ensureNonNullable(this.values.get(cell), `Unknown cell: ${cell}`);
  }

  public snapshot(): BoardSnapshot {
    return new Map(this.values);
  }
}
