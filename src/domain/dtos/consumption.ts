import { z } from "zod";

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

const applianceCount = z.number().int().min(0);

/** Longest window, in days, a range read may cover. */
export const MAX_WINDOW_DAYS = 365;

// Counts are checked by the energy model so that a bad count surfaces as
// InvalidInputError rather than a schema failure.
export const SubmitConsumptionDto = z.object({
  appliances: z.record(z.string(), z.unknown()),
});

export const ConsumptionRangeQueryDto = z.object({
  days: z.coerce.number().int().min(0).max(MAX_WINDOW_DAYS).optional(),
});

export const ExportConsumptionQueryDto = z.object({
  days: z.coerce.number().int().min(0).max(MAX_WINDOW_DAYS).optional(),
  format: z.enum(["csv", "xlsx"]).optional(),
});

/** Shape every stored consumption document must have when read back. */
export const ConsumptionRecordDto = z.object({
  username: z.string().min(1),
  date: z.string().regex(DATE_KEY),
  day_of_week: z.string(),
  appliances: z.object({
    lights: applianceCount,
    fans: applianceCount,
    tvs: applianceCount,
    ac: applianceCount,
    fridge: applianceCount,
    washing_machine: applianceCount,
  }),
  total_energy_kwh: z.number().min(0),
  estimated_cost: z.number().min(0),
});
