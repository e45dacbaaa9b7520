import mongoose from "mongoose";

const userSchema = new mongoose.Schema(
  {
    clerkUserId: {
      type: String,
      required: true,
      unique: true,
    },
    username: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    email: {
      type: String,
      required: true,
      lowercase: true,
      trim: true,
    },
    firstName: {
      type: String,
    },
    lastName: {
      type: String,
    },
    role: {
      type: String,
      enum: ["admin", "staff"],
    },
    profile: {
      fullName: { type: String, default: "" },
      city: { type: String, default: "" },
      area: { type: String, default: "" },
      age: { type: Number, default: 0 },
      phone: { type: String, default: "" },
      occupation: { type: String, default: "" },
      householdSize: { type: Number, default: 1, min: 1 },
    },
  },
  {
    timestamps: true,
  }
);

export const getUserModel = (connection: mongoose.Connection) =>
  connection.model("User", userSchema);

export type UserModel = ReturnType<typeof getUserModel>;
