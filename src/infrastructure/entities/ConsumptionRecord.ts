import mongoose from "mongoose";

const applianceCount = () => ({
  type: Number,
  required: true,
  min: 0,
  default: 0,
});

const consumptionRecordSchema = new mongoose.Schema(
  {
    username: {
      type: String,
      required: true,
      index: true,
    },
    // Calendar day in the server's local time zone, YYYY-MM-DD
    date: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
    },
    day_of_week: {
      type: String,
      required: true,
    },
    appliances: {
      lights: applianceCount(),
      fans: applianceCount(),
      tvs: applianceCount(),
      ac: applianceCount(),
      fridge: applianceCount(),
      washing_machine: applianceCount(),
    },
    total_energy_kwh: {
      type: Number,
      required: true,
      min: 0,
    },
    estimated_cost: {
      type: Number,
      required: true,
      min: 0,
    },
    // Time of the latest write for this day
    timestamp: {
      type: Date,
      default: Date.now,
    },
  },
  {
    timestamps: true,
    collection: "consumption",
  }
);

// One record per user per day
consumptionRecordSchema.index({ username: 1, date: 1 }, { unique: true });

export const getConsumptionRecordModel = (connection: mongoose.Connection) =>
  connection.model("ConsumptionRecord", consumptionRecordSchema);

export type ConsumptionRecordModel = ReturnType<typeof getConsumptionRecordModel>;
