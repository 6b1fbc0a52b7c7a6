import { BatchstatError } from '../core/errors';

export type ColumnType = 'string' | 'int';

export type ColumnSpec = {
  name: string;
  type: ColumnType;
};

export type Cell = string | number;

export type Row = readonly Cell[];

export type Alignment = 'left' | 'right';

export type TableFormatOptions = {
  /** Per-column alignment; columns without an entry are right-aligned. */
  align?: readonly Alignment[];
};

/** Rows of cells under a fixed column schema. */
export class ReportTable {
  private rowData: Row[] = [];

  constructor(readonly columns: readonly ColumnSpec[]) {}

  static from(columns: readonly ColumnSpec[], rows: readonly Row[]): ReportTable {
    const table = new ReportTable(columns);
    for (const row of rows) {
      table.addRow(row);
    }
    return table;
  }

  get columnNames(): string[] {
    return this.columns.map((column) => column.name);
  }

  get rows(): readonly Row[] {
    return this.rowData;
  }

  get length(): number {
    return this.rowData.length;
  }

  addRow(row: Row): void {
    if (row.length !== this.columns.length) {
      throw invalidRow(`expected ${this.columns.length} cells, got ${row.length}`);
    }
    this.columns.forEach((column, index) => {
      const cell = row[index];
      const ok =
        column.type === 'int'
          ? typeof cell === 'number' && Number.isInteger(cell)
          : typeof cell === 'string';
      if (!ok) {
        throw invalidRow(`column "${column.name}" expects ${column.type}, got ${String(cell)}`);
      }
    });
    this.rowData.push([...row]);
  }

  clear(): void {
    this.rowData = [];
  }

  /**
   * Stable sort on one or more columns. Descending order is the ascending
   * order reversed.
   */
  sort(columns: string | readonly string[], ascending = true): void {
    const keys = typeof columns === 'string' ? [columns] : [...columns];
    const names = this.columnNames;
    const unknown = [...new Set(keys)].filter((key) => !names.includes(key));
    if (unknown.length > 0) {
      throw new BatchstatError({
        code: 'report.unknown_column',
        message: `cannot sort the report entries: column(s) ${unknown.join(', ')} not found`,
        kind: 'validation',
        details: { unknown, columns: names },
      });
    }
    const indexes = keys.map((key) => names.indexOf(key));
    const sorted = [...this.rowData].sort((a, b) => {
      for (const index of indexes) {
        const order = compareCells(a[index], b[index]);
        if (order !== 0) return order;
      }
      return 0;
    });
    this.rowData = ascending ? sorted : sorted.reverse();
  }

  equals(other: ReportTable): boolean {
    if (this.columns.length !== other.columns.length) return false;
    const sameSchema = this.columns.every((column, index) => {
      const otherColumn = other.columns[index];
      return otherColumn?.name === column.name && otherColumn.type === column.type;
    });
    if (!sameSchema || this.length !== other.length) return false;
    return this.rowData.every((row, rowIndex) => {
      const otherRow = other.rows[rowIndex];
      return otherRow !== undefined && row.every((cell, index) => cell === otherRow[index]);
    });
  }

  /** Fixed-width text: header, separator, then one line per row. */
  format(options?: TableFormatOptions): string[] {
    const cells = this.rowData.map((row) => row.map((cell) => String(cell)));
    const widths = this.columns.map((column, index) =>
      Math.max(column.name.length, ...cells.map((row) => (row[index] ?? '').length)),
    );
    const align = (values: readonly string[]): string =>
      values
        .map((value, index) => {
          const width = widths[index] ?? 0;
          return options?.align?.[index] === 'left'
            ? value.padEnd(width)
            : value.padStart(width);
        })
        .join(' ');

    return [
      align(this.columnNames),
      widths.map((width) => '-'.repeat(width)).join(' '),
      ...cells.map((row) => align(row)),
    ];
  }

  toJSON(): { columns: string[]; rows: Cell[][] } {
    return { columns: this.columnNames, rows: this.rowData.map((row) => [...row]) };
  }
}

function compareCells(a: Cell | undefined, b: Cell | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a ?? '');
  const right = String(b ?? '');
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function invalidRow(reason: string): BatchstatError {
  return new BatchstatError({
    code: 'report.invalid_row',
    message: `Invalid report row: ${reason}`,
    kind: 'internal',
  });
}
