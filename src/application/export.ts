import * as XLSX from "xlsx";
import { ConsumptionRecord } from "../domain/types";

export const EXPORT_COLUMNS = [
  "Date",
  "Day of Week",
  "Lights",
  "Fans",
  "TVs",
  "Air Conditioners",
  "Refrigerators",
  "Washing Machines",
  "Total Energy (kWh)",
  "Estimated Cost",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number>;

export const toExportRows = (records: readonly ConsumptionRecord[]): ExportRow[] =>
  records.map((record) => ({
    "Date": record.date,
    "Day of Week": record.day_of_week,
    "Lights": record.appliances.lights,
    "Fans": record.appliances.fans,
    "TVs": record.appliances.tvs,
    "Air Conditioners": record.appliances.ac,
    "Refrigerators": record.appliances.fridge,
    "Washing Machines": record.appliances.washing_machine,
    "Total Energy (kWh)": record.total_energy_kwh,
    "Estimated Cost": record.estimated_cost,
  }));

const buildWorksheet = (records: readonly ConsumptionRecord[]) =>
  XLSX.utils.json_to_sheet(toExportRows(records), { header: [...EXPORT_COLUMNS] });

export const renderCsv = (records: readonly ConsumptionRecord[]): string =>
  XLSX.utils.sheet_to_csv(buildWorksheet(records));

export const renderWorkbook = (records: readonly ConsumptionRecord[]): Buffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, buildWorksheet(records), "Energy Data");
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return buffer;
};
