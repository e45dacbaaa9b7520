import mongoose from "mongoose";
import { ConsumptionStore } from "../../application/consumption-ledger";
import { ConsumptionRecord } from "../../domain/types";
import {
  ConsumptionRecordModel,
  getConsumptionRecordModel,
} from "../entities/ConsumptionRecord";

const DUPLICATE_KEY = 11000;

const isDuplicateKeyError = (error: unknown) =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;

export class MongoConsumptionStore implements ConsumptionStore {
  private readonly records: ConsumptionRecordModel;

  constructor(connection: mongoose.Connection) {
    this.records = getConsumptionRecordModel(connection);
  }

  async findOne(username: string, date: string): Promise<unknown> {
    return this.records.findOne({ username, date }).lean().exec();
  }

  async findInRange(username: string, fromDate: string, toDate: string): Promise<unknown[]> {
    return this.records
      .find({ username, date: { $gte: fromDate, $lte: toDate } })
      .sort({ date: 1 })
      .lean()
      .exec();
  }

  async insert(record: ConsumptionRecord, writtenAt: Date): Promise<"inserted" | "duplicate"> {
    try {
      await this.records.create({ ...record, timestamp: writtenAt });
      return "inserted";
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return "duplicate";
      }
      throw error;
    }
  }

  async replace(record: ConsumptionRecord, writtenAt: Date): Promise<void> {
    // $set of every field in one update: the day's document is replaced whole,
    // or recreated when it was deleted after the ledger looked it up
    await this.records
      .updateOne(
        { username: record.username, date: record.date },
        { $set: { ...record, timestamp: writtenAt } },
        { upsert: true, runValidators: true }
      )
      .exec();
  }
}
