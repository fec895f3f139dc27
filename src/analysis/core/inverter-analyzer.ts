import { innerJoinOnTimestamp } from './join';
import {
  DEFAULT_PV_CAPACITY_MWP,
  simulatedEnergyKwh,
} from './performance-ratio';
import {
  InverterEfficiencyRow,
  InverterRow,
  InverterSet,
  InverterSummary,
  PRRow,
} from './types';

export const DEFAULT_EFFICIENCY_THRESHOLD = 0.9;

export interface InverterSetAnalysis {
  summary: InverterSummary;
  rows: InverterEfficiencyRow[];
}

/**
 * Summarize every inverter set against the PR rows.
 *
 * Sets are independent: one summary per input, in input order. A set that
 * failed to load yields an error summary and does not affect the others.
 */
export function analyzeInverters(
  prRows: readonly PRRow[],
  inverterSets: readonly InverterSet[],
  pvCapacityMwp: number = DEFAULT_PV_CAPACITY_MWP,
  efficiencyThreshold: number = DEFAULT_EFFICIENCY_THRESHOLD,
): InverterSummary[] {
  return inverterSets.map((set) => {
    if ('error' in set) {
      return {
        sourceId: set.sourceId,
        lowEfficiencyCount: 0,
        meanEfficiency: null,
        joinedRowCount: 0,
        error: set.error,
      };
    }
    return analyzeInverterSet(
      prRows,
      set.sourceId,
      set.rows,
      pvCapacityMwp,
      efficiencyThreshold,
    ).summary;
  });
}

/**
 * Join one inverter's rows with the PR rows and compute its efficiency.
 *
 * Intervals whose simulated energy is not positive are dropped before any
 * statistic, so they count neither as low efficiency nor toward the mean.
 */
export function analyzeInverterSet(
  prRows: readonly PRRow[],
  sourceId: string,
  inverterRows: readonly InverterRow[],
  pvCapacityMwp: number = DEFAULT_PV_CAPACITY_MWP,
  efficiencyThreshold: number = DEFAULT_EFFICIENCY_THRESHOLD,
): InverterSetAnalysis {
  const rows: InverterEfficiencyRow[] = [];

  for (const [pr, inv] of innerJoinOnTimestamp(prRows, inverterRows)) {
    const simulated = simulatedEnergyKwh(pr.irradiance, pvCapacityMwp);
    if (!(simulated > 0)) continue;

    rows.push({
      timestamp: pr.timestamp,
      irradiance: pr.irradiance,
      energyOutputKwh: inv.value,
      simulatedEnergyKwh: simulated,
      efficiency: inv.value / simulated,
    });
  }

  const lowEfficiencyCount = rows.filter(
    (r) => r.efficiency < efficiencyThreshold,
  ).length;
  const meanEfficiency =
    rows.length > 0
      ? rows.reduce((sum, r) => sum + r.efficiency, 0) / rows.length
      : null;

  return {
    summary: {
      sourceId,
      lowEfficiencyCount,
      meanEfficiency,
      joinedRowCount: rows.length,
      error: null,
    },
    rows,
  };
}
