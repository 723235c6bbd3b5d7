import { ensureNonNullable } from './typeGuards.ts';

export type CellId = `${RowLabel}${ColumnLabel}`;
export type ColumnLabel = typeof COLUMN_LABELS[number];
export type RowLabel = typeof ROW_LABELS[number];
export type UnitType = 'box' | 'column' | 'diagonal' | 'row';

export const ROW_LABELS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I'] as const;
export const COLUMN_LABELS = ['1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;

export const BOX_SIZE = 3;

const UNIT_TYPE_NAMES: Record<UnitType, string> = {
  box: 'Box',
  column: 'Column',
  diagonal: 'Diagonal',
  row: 'Row'
};

export class Unit {
  public readonly label: string;

  public constructor(public readonly type: UnitType, public readonly id: number, public readonly cells: readonly CellId[]) {
    switch (type) {
      case 'column':
        this.label = ensureNonNullable(COLUMN_LABELS[id - 1]);
        break;
      case 'row':
        this.label = ensureNonNullable(ROW_LABELS[id - 1]);
        break;
      default:
        this.label = String(id);
        break;
    }
  }

  public toString(): string {
    return `${UNIT_TYPE_NAMES[this.type]} ${this.label}`;
  }
}

/**
 * Static structure of the grid: the unit list and the peers of every cell.
 *
 * Built once per diagonal mode and shared by every board, strategy and search call.
 */
export class Topology {
  public readonly cells: readonly CellId[];
  public readonly units: readonly Unit[];
  private readonly peersByCell: ReadonlyMap<CellId, ReadonlySet<CellId>>;

  public constructor(public readonly isDiagonal: boolean) {
    this.cells = cross(ROW_LABELS, COLUMN_LABELS);
    this.units = buildUnits(ROW_LABELS, COLUMN_LABELS, isDiagonal);
    this.peersByCell = buildPeers(this.units);
  }

  public getPeers(cell: CellId): ReadonlySet<CellId> {
    return ensureNonNullable(this.peersByCell.get(cell), `Unknown cell: ${cell}`);
  }
}

export function buildPeers(units: readonly Unit[]): Map<CellId, Set<CellId>> {
  const peers = new Map<CellId, Set<CellId>>();
  for (const unit of units) {
    for (const cell of unit.cells) {
      let cellPeers = peers.get(cell);
      if (!cellPeers) {
        cellPeers = new Set<CellId>();
        peers.set(cell, cellPeers);
      }
      for (const other of unit.cells) {
        if (other !== cell) {
          cellPeers.add(other);
        }
      }
    }
  }
  return peers;
}

/**
 * Rows, then columns, then 3x3 boxes (row-major), then the two diagonals when enabled.
 */
export function buildUnits(rows: readonly RowLabel[], columns: readonly ColumnLabel[], isDiagonal: boolean): Unit[] {
  const units: Unit[] = [];

  rows.forEach((row, index) => {
    units.push(new Unit('row', index + 1, cross([row], columns)));
  });
  columns.forEach((column, index) => {
    units.push(new Unit('column', index + 1, cross(rows, [column])));
  });

  let boxId = 1;
  for (const rowBand of chunk(rows, BOX_SIZE)) {
    for (const columnBand of chunk(columns, BOX_SIZE)) {
      units.push(new Unit('box', boxId, cross(rowBand, columnBand)));
      boxId++;
    }
  }

  if (isDiagonal) {
    const reversedColumns = [...columns].reverse();
    units.push(new Unit('diagonal', 1, rows.map((row, index) => toCellId(row, ensureNonNullable(columns[index])))));
    units.push(new Unit('diagonal', 2, rows.map((row, index) => toCellId(row, ensureNonNullable(reversedColumns[index])))));
  }

  return units;
}

export function cross(rows: readonly RowLabel[], columns: readonly ColumnLabel[]): CellId[] {
  return rows.flatMap((row) => columns.map((column) => toCellId(row, column)));
}

export function toCellId(row: RowLabel, column: ColumnLabel): CellId {
  return `${row}${column}`;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}
