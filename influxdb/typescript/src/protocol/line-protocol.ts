import { ColumnType } from '../table/index.js';
import type { MeasurementTable, TableColumn, TableRow } from '../table/index.js';

/**
 * Serializes measurement tables to InfluxDB line protocol.
 *
 * Each row becomes `<table> <field>=<value>[,...] <seconds>\n`. No tags are
 * written and timestamps are always in seconds (`precision=s`).
 *
 * Names and values are written verbatim: commas, spaces and quotes are
 * not escaped, so existing consumers see the same bytes as before.
 */
export class LineProtocolEncoder {
  /**
   * Encode several tables into one request body.
   */
  encodeAll(tables: readonly MeasurementTable[], fallbackTimestampSeconds: number): string {
    let output = '';
    for (const table of tables) {
      output += this.encode(table, table.timestampColumn, fallbackTimestampSeconds);
    }
    return output;
  }

  /**
   * Encode one table. Rows without a usable field are skipped.
   */
  encode(
    table: MeasurementTable,
    timestampColumn: TableColumn | undefined,
    fallbackTimestampSeconds: number
  ): string {
    let output = '';

    for (const row of table.rows) {
      const fields: string[] = [];
      for (const column of table.columnsWithoutTimestamp) {
        const field = formatField(table, column, row);
        if (field !== undefined) {
          fields.push(field);
        }
      }

      if (fields.length === 0) {
        continue;
      }

      const timestamp = resolveTimestamp(table, timestampColumn, row) ?? fallbackTimestampSeconds;
      output += `${table.name} ${fields.join(',')} ${timestamp}\n`;
    }

    return output;
  }
}

/**
 * Format one field as `name=value`, or undefined when it should be dropped.
 *
 * String columns are double-quoted; every other type is written raw and
 * dropped when blank.
 */
export function formatField(
  table: MeasurementTable,
  column: TableColumn,
  row: TableRow
): string | undefined {
  const value = table.getCell(column, row)?.asString();
  if (value === undefined || value === '') {
    return undefined;
  }

  if (column.type === ColumnType.String) {
    return `${column.name}="${value}"`;
  }

  if (value.trim() === '') {
    return undefined;
  }

  return `${column.name}=${value}`;
}

function resolveTimestamp(
  table: MeasurementTable,
  timestampColumn: TableColumn | undefined,
  row: TableRow
): number | undefined {
  if (!timestampColumn) {
    return undefined;
  }
  return table.getCell(timestampColumn, row)?.asTimestampSeconds();
}

/**
 * Current time in whole UTC seconds.
 */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
