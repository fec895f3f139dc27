import { classifyIssue } from './issue-classifier';
import { innerJoinOnTimestamp } from './join';
import { PerformanceStatus, PRRow, TimeSeriesRow } from './types';

export const DEFAULT_PV_CAPACITY_MWP = 2.06;
export const DEFAULT_PR_THRESHOLD = 0.75;
export const KW_PER_MW = 1000;

/**
 * Theoretical energy for an interval: irradiance x rated capacity in kW.
 */
export function simulatedEnergyKwh(
  irradiance: number,
  pvCapacityMwp: number,
): number {
  return irradiance * pvCapacityMwp * KW_PER_MW;
}

/**
 * Good when PR reaches the threshold (inclusive). A non-finite PR
 * (x/0 is Infinity, 0/0 is NaN) is never Good.
 */
export function classifyStatus(
  pr: number,
  prThreshold: number,
): PerformanceStatus {
  return Number.isFinite(pr) && pr >= prThreshold
    ? PerformanceStatus.GOOD
    : PerformanceStatus.NEEDS_ATTENTION;
}

/**
 * Join EM irradiance with revenue-meter energy and derive PR per interval.
 *
 * Intervals missing on either side are excluded. Zero irradiance keeps
 * the row with a non-finite PR, which the issue classifier flags as a
 * sensor outage.
 */
export function computePr(
  irradiance: readonly TimeSeriesRow[],
  revenue: readonly TimeSeriesRow[],
  pvCapacityMwp: number = DEFAULT_PV_CAPACITY_MWP,
  prThreshold: number = DEFAULT_PR_THRESHOLD,
): PRRow[] {
  return innerJoinOnTimestamp(irradiance, revenue).map(([em, rm]) => {
    const pr = rm.value / simulatedEnergyKwh(em.value, pvCapacityMwp);
    return {
      timestamp: em.timestamp,
      irradiance: em.value,
      energyKwh: rm.value,
      pr,
      status: classifyStatus(pr, prThreshold),
      issue: classifyIssue(pr, prThreshold),
    };
  });
}
