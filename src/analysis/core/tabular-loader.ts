import { MalformedInputError } from './errors';
import {
  ColumnMap,
  RawCell,
  RawTable,
  SourceRole,
  TimeSeriesRow,
} from './types';

/** Row holding the column labels (rows 0-1 are export metadata) */
export const HEADER_ROW_INDEX = 2;
export const FIRST_DATA_ROW_INDEX = 3;

/**
 * Fixed column layout of the plant's "5 minutes" exports.
 * Timestamp is always column D; the reading is column E for the EM
 * export and column F for the revenue meter and inverter exports.
 */
export const DEFAULT_COLUMN_MAPS: Readonly<Record<SourceRole, ColumnMap>> = {
  irradiance: { timestampColumn: 3, valueColumn: 4 },
  revenue_meter: { timestampColumn: 3, valueColumn: 5 },
  inverter: { timestampColumn: 3, valueColumn: 5 },
};

export interface LoadStats {
  role: SourceRole;
  /** Header labels of the mapped columns, as found in the header row */
  timestampLabel: string;
  valueLabel: string;
  dataRows: number;
  keptRows: number;
  /** Rows dropped for a missing timestamp or a non-numeric/negative value */
  skippedRows: number;
}

export interface LoadResult {
  rows: TimeSeriesRow[];
  stats: LoadStats;
}

/**
 * Convert a raw table into an ordered time series for the given role.
 *
 * @throws MalformedInputError when the table has no data section or the
 *   header row does not reach the mapped columns
 */
export function load(
  table: RawTable,
  role: SourceRole,
  columnMap: ColumnMap = DEFAULT_COLUMN_MAPS[role],
): TimeSeriesRow[] {
  return loadWithStats(table, role, columnMap).rows;
}

/**
 * Same as {@link load}, also reporting which columns were used and how
 * many rows were dropped during sanitization.
 */
export function loadWithStats(
  table: RawTable,
  role: SourceRole,
  columnMap: ColumnMap = DEFAULT_COLUMN_MAPS[role],
): LoadResult {
  if (table.length <= FIRST_DATA_ROW_INDEX) {
    throw new MalformedInputError(
      `Expected metadata rows, a header row and at least one data row; got ${table.length} row(s)`,
      role,
    );
  }

  const header = table[HEADER_ROW_INDEX];
  const requiredColumns =
    Math.max(columnMap.timestampColumn, columnMap.valueColumn) + 1;
  if (header.length < requiredColumns) {
    throw new MalformedInputError(
      `Header row has ${header.length} column(s), expected at least ${requiredColumns}`,
      role,
    );
  }

  const rows: TimeSeriesRow[] = [];
  let skippedRows = 0;

  for (let i = FIRST_DATA_ROW_INDEX; i < table.length; i++) {
    const row = table[i];
    const timestamp = toTimestampKey(row[columnMap.timestampColumn] ?? null);
    const value = toNumber(row[columnMap.valueColumn] ?? null);

    if (timestamp === null || value === null || value < 0) {
      skippedRows++;
      continue;
    }

    rows.push({ timestamp, value });
  }

  return {
    rows,
    stats: {
      role,
      timestampLabel: headerLabel(header, columnMap.timestampColumn),
      valueLabel: headerLabel(header, columnMap.valueColumn),
      dataRows: table.length - FIRST_DATA_ROW_INDEX,
      keptRows: rows.length,
      skippedRows,
    },
  };
}

/**
 * Canonical join key for a timestamp cell, or null when the cell is empty.
 */
export function toTimestampKey(cell: RawCell): string | null {
  if (cell === null || typeof cell === 'boolean') {
    return null;
  }
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? null : cell.toISOString();
  }
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? String(cell) : null;
  }

  const trimmed = cell.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Strict numeric coercion: the whole cell must be a finite number.
 * Anything else (blank, text, dates, booleans) is treated as missing.
 */
export function toNumber(cell: RawCell): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell !== 'string') {
    return null;
  }

  const trimmed = cell.trim();
  if (trimmed === '') {
    return null;
  }

  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

function headerLabel(header: RawCell[], column: number): string {
  return toTimestampKey(header[column] ?? null) ?? `column ${column}`;
}
