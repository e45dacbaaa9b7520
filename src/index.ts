import "dotenv/config";
import { createServer } from "./api/app";
import { ConsumptionLedger } from "./application/consumption-ledger";
import { loadConfig } from "./infrastructure/config";
import { closeDatabaseConnection, createDatabaseConnection } from "./infrastructure/db";
import { MongoConsumptionStore } from "./infrastructure/stores/mongo-consumption-store";
import { MongoUserDirectory } from "./infrastructure/stores/mongo-user-directory";

const main = async () => {
  const config = loadConfig();
  const connection = await createDatabaseConnection(config.mongodbUrl);

  const server = createServer({
    ledger: new ConsumptionLedger(new MongoConsumptionStore(connection)),
    users: new MongoUserDirectory(connection),
    corsOrigin: config.corsOrigin,
  });

  const httpServer = server.listen(config.port, () => {
    console.log(`[Server] Running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    httpServer.close();
    closeDatabaseConnection(connection)
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[Server] Error while closing the database connection", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((error) => {
  console.error("[Server] Failed to start", error);
  process.exit(1);
});
