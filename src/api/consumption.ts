import express from "express";
import { ConsumptionLedger } from "../application/consumption-ledger";
import { createConsumptionHandlers, getEnergyRates } from "../application/consumption";
import { UserDirectory } from "../application/user-directory";
import { authenticationMiddleware } from "./middlewares/authentication-middleware";
import { createCurrentUserMiddleware } from "./middlewares/current-user-middleware";

export const createConsumptionRouter = (ledger: ConsumptionLedger, users: UserDirectory) => {
  const consumptionRouter = express.Router();
  const currentUserMiddleware = createCurrentUserMiddleware(users);
  const {
    previewConsumption,
    getTodayStatus,
    submitTodayConsumption,
    getConsumptionRecords,
    getConsumptionSummary,
    exportConsumption,
  } = createConsumptionHandlers(ledger);

  consumptionRouter.route("/rates").get(getEnergyRates);
  consumptionRouter.route("/preview").post(authenticationMiddleware, previewConsumption);
  consumptionRouter
    .route("/today")
    .get(authenticationMiddleware, currentUserMiddleware, getTodayStatus)
    .put(authenticationMiddleware, currentUserMiddleware, submitTodayConsumption);
  consumptionRouter
    .route("/summary")
    .get(authenticationMiddleware, currentUserMiddleware, getConsumptionSummary);
  consumptionRouter
    .route("/export")
    .get(authenticationMiddleware, currentUserMiddleware, exportConsumption);
  consumptionRouter
    .route("/")
    .get(authenticationMiddleware, currentUserMiddleware, getConsumptionRecords);

  return consumptionRouter;
};
