/**
 * Read-only view of the tabular measurement data handed to the exporter.
 *
 * The exporter only reads through these interfaces; values are expected
 * to be fully calculated upstream.
 *
 * @module table
 */

/**
 * Column type tags. Only `STRING` changes how a value is written.
 */
export enum ColumnType {
  String = 'STRING',
  Number = 'NUMBER',
  Integer = 'INTEGER',
  Boolean = 'BOOLEAN',
  Timestamp = 'TIMESTAMP',
}

/**
 * A table column.
 */
export interface TableColumn {
  readonly name: string;
  readonly type: ColumnType;
}

/**
 * A table row. Rows are opaque keys into the cell lookup.
 */
export interface TableRow {
  readonly index: number;
}

/**
 * A resolved cell value.
 */
export interface TableCell {
  /** Calculated value as text, or undefined when nothing was calculated. */
  asString(): string | undefined;
  /** Calculated value as seconds since epoch, for timestamp columns. */
  asTimestampSeconds(): number | undefined;
}

/**
 * A named table of measurements.
 */
export interface MeasurementTable {
  readonly name: string;
  /** Rows in output order. */
  readonly rows: readonly TableRow[];
  /** Columns in output order, excluding the timestamp column. */
  readonly columnsWithoutTimestamp: readonly TableColumn[];
  /** Designated timestamp column, if the table has one. */
  readonly timestampColumn?: TableColumn;
  /** Cell at (column, row), if present. */
  getCell(column: TableColumn, row: TableRow): TableCell | undefined;
}

/**
 * One unit of exportable data.
 */
export interface Snapshot {
  readonly timestamp: Date;
  readonly tables: readonly MeasurementTable[];
}

// ============================================================================
// In-memory implementation
// ============================================================================

/**
 * Raw cell input accepted by {@link TableBuilder}.
 */
export type CellInput = string | number | boolean | Date | null | undefined;

/**
 * Cell holding an already calculated value.
 */
export class ValueCell implements TableCell {
  constructor(private readonly value: CellInput) {}

  asString(): string | undefined {
    if (this.value === null || this.value === undefined) {
      return undefined;
    }
    if (this.value instanceof Date) {
      return String(Math.floor(this.value.getTime() / 1000));
    }
    return String(this.value);
  }

  asTimestampSeconds(): number | undefined {
    if (this.value instanceof Date) {
      return Math.floor(this.value.getTime() / 1000);
    }
    if (typeof this.value === 'number' && Number.isFinite(this.value)) {
      return Math.floor(this.value);
    }
    if (typeof this.value === 'string' && /^-?\d+$/.test(this.value.trim())) {
      return Number.parseInt(this.value.trim(), 10);
    }
    return undefined;
  }
}

/**
 * Immutable in-memory table.
 */
export class InMemoryTable implements MeasurementTable {
  readonly name: string;
  readonly rows: readonly TableRow[];
  readonly columnsWithoutTimestamp: readonly TableColumn[];
  readonly timestampColumn?: TableColumn;
  private readonly cells: ReadonlyMap<TableColumn, ReadonlyMap<number, TableCell>>;

  constructor(options: {
    name: string;
    columns: readonly TableColumn[];
    timestampColumn?: TableColumn;
    rows: readonly TableRow[];
    cells: ReadonlyMap<TableColumn, ReadonlyMap<number, TableCell>>;
  }) {
    this.name = options.name;
    this.columnsWithoutTimestamp = options.columns;
    this.timestampColumn = options.timestampColumn;
    this.rows = options.rows;
    this.cells = options.cells;
  }

  getCell(column: TableColumn, row: TableRow): TableCell | undefined {
    return this.cells.get(column)?.get(row.index);
  }
}

/**
 * Builder for {@link InMemoryTable}.
 *
 * @example
 * ```typescript
 * const table = new TableBuilder('inverter')
 *   .column('power', ColumnType.Number)
 *   .column('state', ColumnType.String)
 *   .timestamp('time')
 *   .row({ power: 1250, state: 'ok', time: 1700000000 })
 *   .build();
 * ```
 */
export class TableBuilder {
  private readonly columns: TableColumn[] = [];
  private timestampColumn?: TableColumn;
  private readonly rowValues: Array<Record<string, CellInput>> = [];

  constructor(private readonly name: string) {}

  column(name: string, type: ColumnType = ColumnType.Number): this {
    this.columns.push({ name, type });
    return this;
  }

  /**
   * Designates the timestamp column.
   */
  timestamp(name: string): this {
    this.timestampColumn = { name, type: ColumnType.Timestamp };
    return this;
  }

  /**
   * Adds a row. Keys missing from `values` leave the cell absent.
   */
  row(values: Record<string, CellInput>): this {
    this.rowValues.push(values);
    return this;
  }

  build(): InMemoryTable {
    const allColumns = this.timestampColumn
      ? [...this.columns, this.timestampColumn]
      : [...this.columns];
    const cells = new Map<TableColumn, Map<number, TableCell>>();
    for (const column of allColumns) {
      cells.set(column, new Map());
    }

    const rows: TableRow[] = this.rowValues.map((values, index) => {
      for (const column of allColumns) {
        if (Object.prototype.hasOwnProperty.call(values, column.name)) {
          cells.get(column)?.set(index, new ValueCell(values[column.name]));
        }
      }
      return { index };
    });

    return new InMemoryTable({
      name: this.name,
      columns: [...this.columns],
      timestampColumn: this.timestampColumn,
      rows,
      cells,
    });
  }
}
