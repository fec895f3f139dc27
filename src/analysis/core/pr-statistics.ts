import { IssueLabel, PerformanceStatus, PRRow } from './types';

/**
 * Descriptive statistics over the finite PR values of a run.
 * Every field but `count` is null when there is nothing to describe;
 * `std` also needs at least two values.
 */
export interface PrDescription {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  median: number | null;
  p75: number | null;
  max: number | null;
}

export type ProblemIssue = Exclude<IssueLabel, IssueLabel.NO_ISSUE>;

export function describePr(prRows: readonly PRRow[]): PrDescription {
  const values = prRows
    .map((r) => r.pr)
    .filter((pr) => Number.isFinite(pr))
    .sort((a, b) => a - b);
  const count = values.length;

  if (count === 0) {
    return {
      count,
      mean: null,
      std: null,
      min: null,
      p25: null,
      median: null,
      p75: null,
      max: null,
    };
  }

  const mean = values.reduce((sum, v) => sum + v, 0) / count;
  const std =
    count > 1
      ? Math.sqrt(
          values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1),
        )
      : null;

  return {
    count,
    mean,
    std,
    min: values[0],
    p25: quantile(values, 0.25),
    median: quantile(values, 0.5),
    p75: quantile(values, 0.75),
    max: values[count - 1],
  };
}

/**
 * Linear-interpolated quantile of an ascending, non-empty array.
 */
export function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function countByStatus(
  prRows: readonly PRRow[],
): Record<PerformanceStatus, number> {
  const counts: Record<PerformanceStatus, number> = {
    [PerformanceStatus.GOOD]: 0,
    [PerformanceStatus.NEEDS_ATTENTION]: 0,
  };
  for (const row of prRows) {
    counts[row.status]++;
  }
  return counts;
}

/**
 * Issue distribution among the rows that need attention.
 */
export function countIssues(
  prRows: readonly PRRow[],
): Record<ProblemIssue, number> {
  const counts: Record<ProblemIssue, number> = {
    [IssueLabel.CALIBRATION_NEEDED]: 0,
    [IssueLabel.MODULE_SOILING]: 0,
    [IssueLabel.SENSOR_OUTAGE]: 0,
  };
  for (const row of prRows) {
    if (row.issue !== IssueLabel.NO_ISSUE) {
      counts[row.issue]++;
    }
  }
  return counts;
}

/**
 * PR rows in chronological order. Rows whose timestamp does not parse as
 * a date keep their relative order at the end.
 */
export function prTimeline(prRows: readonly PRRow[]): PRRow[] {
  const keyed = prRows.map((row) => ({ row, time: Date.parse(row.timestamp) }));
  keyed.sort((a, b) => {
    const aValid = !Number.isNaN(a.time);
    const bValid = !Number.isNaN(b.time);
    if (aValid && bValid) return a.time - b.time;
    if (aValid) return -1;
    if (bValid) return 1;
    return 0;
  });
  return keyed.map((k) => k.row);
}
