import { describe, expect, it } from "vitest";
import { summarizeConsumption } from "../../src/domain/aggregation";
import { ConsumptionRecord } from "../../src/domain/types";

const record = (date: string, energy: number, cost: number): ConsumptionRecord => ({
  username: "asha",
  date,
  day_of_week: "Monday",
  appliances: { lights: 0, fans: 0, tvs: 0, ac: 0, fridge: 0, washing_machine: 0 },
  total_energy_kwh: energy,
  estimated_cost: cost,
});

describe("summarizeConsumption", () => {
  it("reports a no-data state for an empty range", () => {
    expect(summarizeConsumption([])).toEqual({ hasData: false, days: 0 });
  });

  it("totals, averages and flags high-consumption days", () => {
    const high = record("2026-10-18", 16, 128);
    const summary = summarizeConsumption([
      record("2026-10-17", 10, 80),
      high,
      record("2026-10-19", 5, 40),
    ]);

    expect(summary).toEqual({
      hasData: true,
      days: 3,
      firstDate: "2026-10-17",
      lastDate: "2026-10-19",
      totalEnergy: 31,
      totalCost: 248,
      averageDaily: 10.33,
      averageDailyCost: 82.67,
      monthlyProjection: 310,
      peakEnergy: 16,
      peakCost: 128,
      highConsumptionDays: [high],
    });
  });

  it("does not flag a day at exactly the threshold", () => {
    const summary = summarizeConsumption([
      record("2026-10-18", 15, 120),
      record("2026-10-19", 15.01, 120.08),
    ]);

    expect(summary.hasData && summary.highConsumptionDays.map((day) => day.date)).toEqual([
      "2026-10-19",
    ]);
  });

  it("keeps float drift out of the totals", () => {
    const summary = summarizeConsumption([
      record("2026-10-17", 0.1, 0.8),
      record("2026-10-18", 0.2, 1.6),
    ]);

    expect(summary.hasData && summary.totalEnergy).toBe(0.3);
    expect(summary.hasData && summary.totalCost).toBe(2.4);
  });
});
