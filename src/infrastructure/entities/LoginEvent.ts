import mongoose from "mongoose";

/**
 * One sign-in, recorded from Clerk's session.created webhook.
 */
const loginEventSchema = new mongoose.Schema(
  {
    username: {
      type: String,
      required: true,
      index: true,
    },
    loginTime: {
      type: Date,
      required: true,
    },
    // YYYY-MM-DD of loginTime
    loginDate: {
      type: String,
      required: true,
    },
    sessionId: {
      type: String,
      required: true,
    },
    source: {
      type: String,
      default: "clerk",
    },
  },
  {
    collection: "login_events",
  }
);

loginEventSchema.index({ username: 1, loginTime: -1 });

export const getLoginEventModel = (connection: mongoose.Connection) =>
  connection.model("LoginEvent", loginEventSchema);

export type LoginEventModel = ReturnType<typeof getLoginEventModel>;
