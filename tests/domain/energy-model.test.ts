import { describe, expect, it } from "vitest";
import {
  computeConsumption,
  ENERGY_RATES,
  normalizeAppliances,
  roundHalfUp,
  TARIFF_PER_KWH,
} from "../../src/domain/energy-model";
import { InvalidInputError } from "../../src/domain/errors/errors";

describe("computeConsumption", () => {
  it("weights each appliance count by its daily rate", () => {
    const estimate = computeConsumption({
      lights: 5,
      fans: 2,
      tvs: 1,
      ac: 1,
      fridge: 1,
      washing_machine: 0,
    });
    expect(estimate).toEqual({ energyKwh: 7.8, cost: 62.4 });
  });

  it("returns zero energy and cost for an empty vector", () => {
    expect(computeConsumption({})).toEqual({ energyKwh: 0, cost: 0 });
  });

  it("returns zero energy and cost when every count is zero", () => {
    expect(
      computeConsumption({ lights: 0, fans: 0, tvs: 0, ac: 0, fridge: 0, washing_machine: 0 })
    ).toEqual({ energyKwh: 0, cost: 0 });
  });

  it("ignores keys outside the rate table", () => {
    expect(computeConsumption({ lights: 1, heater: 4, oven: "large" })).toEqual({
      energyKwh: 0.2,
      cost: 1.6,
    });
  });

  it("rounds away binary noise in the sum", () => {
    expect(computeConsumption({ tvs: 3 })).toEqual({ energyKwh: 0.9, cost: 7.2 });
    expect(computeConsumption({ ac: 2, fridge: 1, washing_machine: 1 })).toEqual({
      energyKwh: 11.9,
      cost: 95.2,
    });
  });

  it("derives cost from the rounded energy", () => {
    const vectors = [
      { lights: 3 },
      { fans: 7, tvs: 2 },
      { ac: 1, washing_machine: 3 },
      { lights: 12, fans: 4, tvs: 2, ac: 2, fridge: 1, washing_machine: 1 },
      { fridge: 5 },
    ];

    for (const appliances of vectors) {
      const { energyKwh, cost } = computeConsumption(appliances);
      expect(cost).toBe(roundHalfUp(energyKwh * TARIFF_PER_KWH));
      expect(computeConsumption(appliances)).toEqual({ energyKwh, cost });
    }
  });

  it("rejects negative counts", () => {
    expect(() => computeConsumption({ fans: -1 })).toThrow(InvalidInputError);
    expect(() => computeConsumption({ fans: -1 })).toThrow(
      'Appliance count for "fans" must be a non-negative integer'
    );
  });

  it("rejects fractional and non-numeric counts for known kinds", () => {
    expect(() => computeConsumption({ lights: 1.5 })).toThrow(InvalidInputError);
    expect(() => computeConsumption({ tvs: "2" })).toThrow(InvalidInputError);
    expect(() => computeConsumption({ ac: Number.NaN })).toThrow(InvalidInputError);
  });
});

describe("normalizeAppliances", () => {
  it("fills every kind, defaulting to zero", () => {
    expect(normalizeAppliances({ ac: 2, garage_door: 1 })).toEqual({
      lights: 0,
      fans: 0,
      tvs: 0,
      ac: 2,
      fridge: 0,
      washing_machine: 0,
    });
  });
});

describe("roundHalfUp", () => {
  it("rounds halves up on the decimal value", () => {
    expect(roundHalfUp(1.005)).toBe(1.01);
    expect(roundHalfUp(2.675)).toBe(2.68);
    expect(roundHalfUp(0.125)).toBe(0.13);
  });

  it("rounds below the half down", () => {
    expect(roundHalfUp(0.124)).toBe(0.12);
    expect(roundHalfUp(31 / 3)).toBe(10.33);
  });

  it("supports other precisions", () => {
    expect(roundHalfUp(1.2345, 3)).toBe(1.235);
    expect(roundHalfUp(7.5, 0)).toBe(8);
  });
});

describe("ENERGY_RATES", () => {
  it("cannot be changed at runtime", () => {
    expect(Object.isFrozen(ENERGY_RATES)).toBe(true);
  });
});
