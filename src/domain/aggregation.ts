import { roundHalfUp } from "./energy-model";
import { ConsumptionRecord } from "./types";

export const HIGH_CONSUMPTION_THRESHOLD_KWH = 15;

export const PROJECTION_DAYS = 30;

export type ConsumptionSummary =
  | { hasData: false; days: 0 }
  | {
      hasData: true;
      days: number;
      firstDate: string;
      lastDate: string;
      totalEnergy: number;
      totalCost: number;
      averageDaily: number;
      averageDailyCost: number;
      monthlyProjection: number;
      peakEnergy: number;
      peakCost: number;
      highConsumptionDays: ConsumptionRecord[];
    };

/**
 * Derives the dashboard figures from an ordered run of daily records.
 * Recomputed on every read.
 */
export const summarizeConsumption = (
  records: readonly ConsumptionRecord[]
): ConsumptionSummary => {
  if (records.length === 0) {
    return { hasData: false, days: 0 };
  }

  const days = records.length;
  let energySum = 0;
  let costSum = 0;
  let peakEnergy = 0;
  let peakCost = 0;

  for (const record of records) {
    energySum += record.total_energy_kwh;
    costSum += record.estimated_cost;
    peakEnergy = Math.max(peakEnergy, record.total_energy_kwh);
    peakCost = Math.max(peakCost, record.estimated_cost);
  }

  const average = energySum / days;

  return {
    hasData: true,
    days,
    firstDate: records[0].date,
    lastDate: records[days - 1].date,
    totalEnergy: roundHalfUp(energySum),
    totalCost: roundHalfUp(costSum),
    averageDaily: roundHalfUp(average),
    averageDailyCost: roundHalfUp(costSum / days),
    // projected from the unrounded average
    monthlyProjection: roundHalfUp(average * PROJECTION_DAYS),
    peakEnergy,
    peakCost,
    highConsumptionDays: records.filter(
      (record) => record.total_energy_kwh > HIGH_CONSUMPTION_THRESHOLD_KWH
    ),
  };
};
