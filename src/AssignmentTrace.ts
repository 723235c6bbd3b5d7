import type { BoardSnapshot } from './Board.ts';
import type { Digit } from './Candidates.ts';
import type { CellId } from './Topology.ts';

export interface AssignmentRecord {
  readonly cell: CellId;
  readonly snapshot: BoardSnapshot;
  readonly value: Digit;
}

export interface AssignmentRecordJson {
  readonly cell: string;
  readonly value: number;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Ordered log of every definitive assignment made during one solve, for visualizers.
 * Nothing in the solver reads it back.
 *
 * Search branches share one trace and it is never trimmed: assignments from abandoned
 * guesses stay, each with a full snapshot. Pass `recordTrace: false` to the solver
 * for puzzles that need deep search.
 */
export class AssignmentTrace {
  public get length(): number {
    return this.records.length;
  }

  private readonly records: AssignmentRecord[] = [];

  public getRecords(): readonly AssignmentRecord[] {
    return this.records;
  }

  public record(cell: CellId, value: Digit, snapshot: BoardSnapshot): void {
    this.records.push({ cell, snapshot, value });
  }

  public toJSON(): AssignmentRecordJson[] {
    return this.records.map((record) => {
      const values: Record<string, string> = {};
      for (const [cell, candidates] of record.snapshot) {
        values[cell] = candidates.toString();
      }
      return { cell: record.cell, value: record.value, values };
    });
  }
}
