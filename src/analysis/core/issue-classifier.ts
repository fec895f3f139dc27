import { IssueLabel, PRRow } from './types';

/** Below this fraction of the PR threshold, soiling is the likely cause */
export const SOILING_FACTOR = 0.9;

/**
 * Secondary diagnostic for a PR value.
 *
 * - pr >= threshold                 -> No Issue
 * - pr <  threshold * 0.9           -> Module Soiling
 * - threshold * 0.9 <= pr < threshold -> Calibration Needed
 * - non-finite pr                   -> Sensor Outage
 */
export function classifyIssue(
  row: Pick<PRRow, 'pr'> | number,
  prThreshold: number,
): IssueLabel {
  const pr = typeof row === 'number' ? row : row.pr;

  if (!Number.isFinite(pr)) {
    return IssueLabel.SENSOR_OUTAGE;
  }
  if (pr >= prThreshold) {
    return IssueLabel.NO_ISSUE;
  }
  if (pr < prThreshold * SOILING_FACTOR) {
    return IssueLabel.MODULE_SOILING;
  }
  return IssueLabel.CALIBRATION_NEEDED;
}
