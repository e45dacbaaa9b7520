import { NextFunction, Request, Response } from "express";
import {
  ConsumptionRangeQueryDto,
  ExportConsumptionQueryDto,
  SubmitConsumptionDto,
} from "../domain/dtos/consumption";
import { summarizeConsumption } from "../domain/aggregation";
import { computeConsumption, ENERGY_RATES, TARIFF_PER_KWH } from "../domain/energy-model";
import { NotFoundError, ValidationError } from "../domain/errors/errors";
import { requireCurrentUser } from "../api/middlewares/current-user-middleware";
import { ConsumptionLedger } from "./consumption-ledger";
import { renderCsv, renderWorkbook } from "./export";

const DEFAULT_RANGE_DAYS = 14;
const DEFAULT_SUMMARY_DAYS = 7;
const DEFAULT_EXPORT_DAYS = 365;

const parseRangeDays = (query: unknown, fallback: number) => {
  const result = ConsumptionRangeQueryDto.safeParse(query);
  if (!result.success) {
    throw new ValidationError(result.error.message);
  }
  return result.data.days ?? fallback;
};

export const getEnergyRates = (req: Request, res: Response) => {
  res.status(200).json({ rates: ENERGY_RATES, tariffPerKwh: TARIFF_PER_KWH });
};

export const createConsumptionHandlers = (ledger: ConsumptionLedger) => {
  const previewConsumption = (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = SubmitConsumptionDto.safeParse(req.body);
      if (!result.success) {
        throw new ValidationError(result.error.message);
      }
      const estimate = computeConsumption(result.data.appliances);
      res.status(200).json({ ...estimate, tariffPerKwh: TARIFF_PER_KWH });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/consumption/today
   * Lets a client warn that submitting will overwrite today's entry.
   */
  const getTodayStatus = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = requireCurrentUser(req);
      const date = ledger.today();
      const record = await ledger.findByDate(user.username, date);
      res.status(200).json({ date, exists: record !== null, record });
    } catch (error) {
      next(error);
    }
  };

  const submitTodayConsumption = async (
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    try {
      const result = SubmitConsumptionDto.safeParse(req.body);
      if (!result.success) {
        throw new ValidationError(result.error.message);
      }

      const user = requireCurrentUser(req);
      const { appliances } = result.data;
      const { energyKwh, cost } = computeConsumption(appliances);
      if (energyKwh <= 0) {
        throw new ValidationError("Please enter at least one appliance");
      }

      const { record, created } = await ledger.upsertToday(
        user.username,
        appliances,
        energyKwh,
        cost
      );
      console.log(
        `[Consumption] ${created ? "Created" : "Overwrote"} ${record.date} for ${user.username}`
      );

      res.status(created ? 201 : 200).json({ created, record });
    } catch (error) {
      next(error);
    }
  };

  const getConsumptionRecords = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = requireCurrentUser(req);
      const days = parseRangeDays(req.query, DEFAULT_RANGE_DAYS);
      const records = await ledger.getRange(user.username, days);
      res.status(200).json(records);
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/consumption/summary
   * Totals, averages and high-usage days over the last `days` days.
   */
  const getConsumptionSummary = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = requireCurrentUser(req);
      const days = parseRangeDays(req.query, DEFAULT_SUMMARY_DAYS);
      const records = await ledger.getRange(user.username, days);
      res.status(200).json({ windowDays: days, ...summarizeConsumption(records) });
    } catch (error) {
      next(error);
    }
  };

  const exportConsumption = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = ExportConsumptionQueryDto.safeParse(req.query);
      if (!result.success) {
        throw new ValidationError(result.error.message);
      }

      const user = requireCurrentUser(req);
      const days = result.data.days ?? DEFAULT_EXPORT_DAYS;
      const format = result.data.format ?? "csv";

      const records = await ledger.getRange(user.username, days);
      if (records.length === 0) {
        throw new NotFoundError("No data available to export");
      }

      const fileName = `energy_data_${user.username}_${ledger.today().replace(/-/g, "")}.${format}`;
      res.attachment(fileName);

      if (format === "xlsx") {
        res
          .status(200)
          .type("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet")
          .send(renderWorkbook(records));
        return;
      }
      res.status(200).type("text/csv").send(renderCsv(records));
    } catch (error) {
      next(error);
    }
  };

  return {
    previewConsumption,
    getTodayStatus,
    submitTodayConsumption,
    getConsumptionRecords,
    getConsumptionSummary,
    exportConsumption,
  };
};
