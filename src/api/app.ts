import express from "express";
import cors from "cors";
import { clerkMiddleware } from "@clerk/express";
import { ConsumptionLedger } from "../application/consumption-ledger";
import { UserDirectory } from "../application/user-directory";
import { createConsumptionRouter } from "./consumption";
import { globalErrorHandler } from "./middlewares/global-error-handling-middleware";
import { loggerMiddleware } from "./middlewares/logger-middleware";
import { createUsersRouter } from "./users";
import { createWebhooksRouter } from "./webhooks";

export type ServerDependencies = {
  ledger: ConsumptionLedger;
  users: UserDirectory;
  corsOrigin?: string;
};

export const createServer = ({ ledger, users, corsOrigin }: ServerDependencies) => {
  const server = express();
  // Any origin unless CORS_ORIGIN is set
  server.use(cors(corsOrigin ? { origin: corsOrigin } : undefined));

  server.use(loggerMiddleware);

  // Needs the raw body for signature verification, so it goes before express.json()
  server.use("/api/webhooks", createWebhooksRouter(users));

  server.use(clerkMiddleware());

  server.use(express.json());

  server.use("/api/consumption", createConsumptionRouter(ledger, users));
  server.use("/api/users", createUsersRouter(users));

  server.use(globalErrorHandler);

  return server;
};
