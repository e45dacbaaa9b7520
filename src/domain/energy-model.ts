import { InvalidInputError } from "./errors/errors";
import { APPLIANCE_KINDS, ApplianceCounts, ApplianceKind } from "./types";

/**
 * Daily kWh drawn by one unit of each appliance kind. Changing a rate is a
 * deployment decision; nothing updates this table at runtime.
 */
export const ENERGY_RATES: Readonly<Record<ApplianceKind, number>> = Object.freeze({
  lights: 0.2,
  fans: 0.2,
  tvs: 0.3,
  ac: 3.0,
  fridge: 3.1,
  washing_machine: 2.8,
});

/** Currency units charged per kWh. */
export const TARIFF_PER_KWH = 8;

export type ConsumptionEstimate = {
  energyKwh: number;
  cost: number;
};

const shiftExponent = (value: number, places: number): string => {
  const [mantissa, exponent = "0"] = String(value).split("e");
  return `${mantissa}e${Number(exponent) + places}`;
};

/**
 * Round half up on the decimal digits of `value`, so 1.005 becomes 1.01 even
 * though its binary form is 1.00499999...
 */
export const roundHalfUp = (value: number, places = 2): number => {
  if (!Number.isFinite(value)) {
    return value;
  }
  const shifted = Math.round(Number(shiftExponent(value, places)));
  return Number(shiftExponent(shifted, -places));
};

/**
 * Full six-kind count vector for the given input. Missing kinds count as zero
 * and keys outside the rate table are dropped.
 */
export const normalizeAppliances = (
  appliances: Readonly<Record<string, unknown>>
): ApplianceCounts => {
  const counts: ApplianceCounts = {
    lights: 0,
    fans: 0,
    tvs: 0,
    ac: 0,
    fridge: 0,
    washing_machine: 0,
  };

  for (const kind of APPLIANCE_KINDS) {
    const value = appliances[kind];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new InvalidInputError(
        `Appliance count for "${kind}" must be a non-negative integer`
      );
    }
    counts[kind] = value;
  }

  return counts;
};

/**
 * Energy is rounded to 2 places first; cost is then derived from the rounded
 * energy and rounded on its own.
 */
export const computeConsumption = (
  appliances: Readonly<Record<string, unknown>>
): ConsumptionEstimate => {
  const counts = normalizeAppliances(appliances);

  let total = 0;
  for (const kind of APPLIANCE_KINDS) {
    total += counts[kind] * ENERGY_RATES[kind];
  }

  const energyKwh = roundHalfUp(total);
  const cost = roundHalfUp(energyKwh * TARIFF_PER_KWH);

  return { energyKwh, cost };
};
