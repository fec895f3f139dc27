/**
 * Canonical types for the performance analysis core.
 *
 * Everything here is plain data: the core functions take and return these
 * shapes without touching files, HTTP or framework state.
 */

/**
 * One cell of an uploaded sheet, as decoded by a table reader.
 */
export type RawCell = string | number | boolean | Date | null;

/**
 * All physical rows of a source sheet.
 *
 * Rows 0 and 1 carry export metadata, row 2 the column headers and
 * data starts at row 3.
 */
export type RawTable = RawCell[][];

/**
 * Which data source a table comes from
 * - irradiance: environmental monitor (EM), W/m²
 * - revenue_meter: billing meter (RM), active energy in kWh
 * - inverter: one inverter's energy output in kWh
 */
export type SourceRole = 'irradiance' | 'revenue_meter' | 'inverter';

/**
 * Physical column positions for a source role (0-based).
 */
export interface ColumnMap {
  timestampColumn: number;
  valueColumn: number;
}

/**
 * A single sanitized reading.
 *
 * `timestamp` is the join key: ISO-8601 for date cells, trimmed text
 * for anything else. `value` is always finite and non-negative.
 */
export interface TimeSeriesRow {
  timestamp: string;
  value: number;
}

/**
 * An inverter reading; `value` is the energy output in kWh.
 */
export type InverterRow = TimeSeriesRow;

export enum PerformanceStatus {
  GOOD = 'Good',
  NEEDS_ATTENTION = 'Needs Attention',
}

export enum IssueLabel {
  NO_ISSUE = 'No Issue',
  CALIBRATION_NEEDED = 'Calibration Needed',
  MODULE_SOILING = 'Module Soiling',
  /** PR could not be computed (zero irradiance or a dead sensor) */
  SENSOR_OUTAGE = 'Sensor Outage',
}

/**
 * One interval where both irradiance and revenue meter reported.
 */
export interface PRRow {
  timestamp: string;
  irradiance: number;
  energyKwh: number;
  /** Non-finite when irradiance is zero */
  pr: number;
  status: PerformanceStatus;
  issue: IssueLabel;
}

/**
 * Input for the inverter analyzer: either loaded rows or the reason
 * the file could not be loaded.
 */
export type InverterSet =
  | { sourceId: string; rows: InverterRow[] }
  | { sourceId: string; error: string };

export interface InverterSummary {
  sourceId: string;
  lowEfficiencyCount: number;
  /** null when no row survived the join (no data, not zero) */
  meanEfficiency: number | null;
  joinedRowCount: number;
  error: string | null;
}

/**
 * One inverter interval joined with its PR row.
 */
export interface InverterEfficiencyRow {
  timestamp: string;
  irradiance: number;
  energyOutputKwh: number;
  simulatedEnergyKwh: number;
  efficiency: number;
}

/**
 * Plant parameters threaded through every analysis call.
 */
export interface AnalysisParameters {
  /** Rated plant output in MWp */
  pvCapacityMwp: number;
  prThreshold: number;
  efficiencyThreshold: number;
}
