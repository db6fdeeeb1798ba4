/**
 * In-memory columnar table implementing the engine's column-source interface
 */
import { ColumnSource, Sample, Series } from '../spec/types';
import { InvalidTableError, MissingColumnError } from '../spec/errors';

export type TableRow = Record<string, unknown>;

function toSample(value: unknown): Sample {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export class InMemoryTable implements ColumnSource {
  private readonly columns: Map<string, Series>;
  private readonly rows: number;

  constructor(columns: Record<string, Series> | Map<string, Series>) {
    const entries = columns instanceof Map ? Array.from(columns.entries()) : Object.entries(columns);
    const lengths = new Set(entries.map(([, series]) => series.length));
    if (lengths.size > 1) {
      throw new InvalidTableError('All columns must have the same length', {
        lengths: Object.fromEntries(entries.map(([name, series]) => [name, series.length])),
      });
    }

    this.columns = new Map(entries.map(([name, series]) => [name, Object.freeze(series.map(toSample))]));
    this.rows = entries.length > 0 ? entries[0][1].length : 0;
  }

  /**
   * Build from row objects; every key seen in any row becomes a column and
   * non-numeric cells read as missing
   */
  static fromRows(rows: readonly TableRow[]): InMemoryTable {
    const names: string[] = [];
    for (const row of rows) {
      for (const name of Object.keys(row)) {
        if (!names.includes(name)) names.push(name);
      }
    }

    const columns = new Map<string, Series>();
    for (const name of names) {
      columns.set(
        name,
        rows.map((row) => toSample(row[name]))
      );
    }
    return new InMemoryTable(columns);
  }

  getColumn(name: string): Series {
    const series = this.columns.get(name);
    if (!series) {
      throw new MissingColumnError(name);
    }
    return series;
  }

  rowCount(): number {
    return this.rows;
  }

  columnNames(): ReadonlySet<string> {
    return new Set(this.columns.keys());
  }

  /**
   * New table with the given columns appended in order; existing columns of
   * the same name are replaced in place
   */
  withColumns(added: Map<string, Series>): InMemoryTable {
    const merged = new Map(this.columns);
    for (const [name, series] of added) {
      if (series.length !== this.rows && this.columns.size > 0) {
        throw new InvalidTableError(
          `Column "${name}" has ${series.length} rows, table has ${this.rows}`
        );
      }
      merged.set(name, series);
    }
    return new InMemoryTable(merged);
  }

  toRows(): Record<string, Sample>[] {
    const names = Array.from(this.columns.keys());
    return Array.from({ length: this.rows }, (_, i) =>
      Object.fromEntries(names.map((name) => [name, this.getColumn(name)[i]]))
    );
  }
}
