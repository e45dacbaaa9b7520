import { ConsumptionRecordDto, MAX_WINDOW_DAYS } from "../domain/dtos/consumption";
import { dayOfWeekName, formatDateKey, isDateKey, shiftDays } from "../domain/dates";
import { normalizeAppliances, roundHalfUp } from "../domain/energy-model";
import {
  CorruptRecordError,
  InvalidInputError,
  toDatabaseError,
} from "../domain/errors/errors";
import { ConsumptionRecord } from "../domain/types";

/**
 * Key-based access to stored consumption documents. Reads return the raw
 * stored document (or null); the ledger validates it.
 */
export interface ConsumptionStore {
  findOne(username: string, date: string): Promise<unknown>;
  findInRange(username: string, fromDate: string, toDate: string): Promise<unknown[]>;
  /** Resolves "duplicate" when a record for the same (username, date) already exists. */
  insert(record: ConsumptionRecord, writtenAt: Date): Promise<"inserted" | "duplicate">;
  /** Writes the record whole, creating it if the day's document has gone since it was read. */
  replace(record: ConsumptionRecord, writtenAt: Date): Promise<void>;
}

export type UpsertResult = {
  record: ConsumptionRecord;
  created: boolean;
};

const parseRecord = (document: unknown): ConsumptionRecord => {
  const result = ConsumptionRecordDto.safeParse(document);
  if (!result.success) {
    throw new CorruptRecordError(
      `Stored consumption record is malformed: ${result.error.message}`,
      result.error
    );
  }
  return result.data;
};

const assertUsername = (username: string) => {
  if (username.trim().length === 0) {
    throw new InvalidInputError("Username is required");
  }
};

/**
 * One record per user per calendar day. Submitting again on the same day
 * replaces that day's record; there is no history of earlier submissions.
 */
export class ConsumptionLedger {
  constructor(
    private readonly store: ConsumptionStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  today(): string {
    return formatDateKey(this.clock());
  }

  async upsertToday(
    username: string,
    appliances: Readonly<Record<string, unknown>>,
    energyKwh: number,
    cost: number
  ): Promise<UpsertResult> {
    assertUsername(username);
    if (!Number.isFinite(energyKwh) || energyKwh < 0) {
      throw new InvalidInputError("Energy must be a non-negative number");
    }
    if (!Number.isFinite(cost) || cost < 0) {
      throw new InvalidInputError("Cost must be a non-negative number");
    }

    const now = this.clock();
    const record: ConsumptionRecord = {
      username,
      date: formatDateKey(now),
      day_of_week: dayOfWeekName(now),
      appliances: normalizeAppliances(appliances),
      total_energy_kwh: roundHalfUp(energyKwh),
      estimated_cost: roundHalfUp(cost),
    };

    try {
      const existing = await this.store.findOne(username, record.date);
      if (existing) {
        await this.store.replace(record, now);
        return { record, created: false };
      }

      // Two sessions can both miss the existing record; the later insert
      // then overwrites instead, leaving a single record with its values.
      const outcome = await this.store.insert(record, now);
      if (outcome === "duplicate") {
        await this.store.replace(record, now);
        return { record, created: false };
      }
      return { record, created: true };
    } catch (error) {
      throw toDatabaseError(error, "Failed to save consumption record");
    }
  }

  /**
   * Records dated from `windowDays` days before today through today,
   * oldest first.
   */
  async getRange(username: string, windowDays: number): Promise<ConsumptionRecord[]> {
    assertUsername(username);
    if (!Number.isInteger(windowDays) || windowDays < 0) {
      throw new InvalidInputError("Window must be a non-negative whole number of days");
    }
    if (windowDays > MAX_WINDOW_DAYS) {
      throw new InvalidInputError(`Window cannot exceed ${MAX_WINDOW_DAYS} days`);
    }

    const now = this.clock();
    const fromDate = formatDateKey(shiftDays(now, -windowDays));
    const toDate = formatDateKey(now);

    let documents: unknown[];
    try {
      documents = await this.store.findInRange(username, fromDate, toDate);
    } catch (error) {
      throw toDatabaseError(error, "Failed to retrieve consumption records");
    }

    return documents
      .map(parseRecord)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  async findByDate(username: string, date: string): Promise<ConsumptionRecord | null> {
    assertUsername(username);
    if (!isDateKey(date)) {
      throw new InvalidInputError(`"${date}" is not a YYYY-MM-DD date`);
    }

    let document: unknown;
    try {
      document = await this.store.findOne(username, date);
    } catch (error) {
      throw toDatabaseError(error, "Failed to look up consumption record");
    }

    return document ? parseRecord(document) : null;
  }

  async exists(username: string, date: string): Promise<boolean> {
    return (await this.findByDate(username, date)) !== null;
  }
}
