import mongoose from "mongoose";

/**
 * Opens a dedicated connection. The caller owns it and closes it with
 * closeDatabaseConnection; nothing here touches mongoose's default connection.
 */
export const createDatabaseConnection = async (
  url: string
): Promise<mongoose.Connection> => {
  console.log("[Database] Connecting to MongoDB");
  const connection = await mongoose
    .createConnection(url, { serverSelectionTimeoutMS: 5000 })
    .asPromise();
  console.log("[Database] Connected to MongoDB");
  return connection;
};

export const closeDatabaseConnection = async (connection: mongoose.Connection) => {
  await connection.close();
  console.log("[Database] Connection closed");
};
