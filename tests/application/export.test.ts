import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { renderCsv, renderWorkbook, toExportRows } from "../../src/application/export";
import { ConsumptionRecord } from "../../src/domain/types";

const records: ConsumptionRecord[] = [
  {
    username: "asha",
    date: "2026-10-18",
    day_of_week: "Sunday",
    appliances: { lights: 4, fans: 2, tvs: 1, ac: 0, fridge: 1, washing_machine: 1 },
    total_energy_kwh: 7.3,
    estimated_cost: 58.4,
  },
  {
    username: "asha",
    date: "2026-10-19",
    day_of_week: "Monday",
    appliances: { lights: 5, fans: 2, tvs: 1, ac: 1, fridge: 1, washing_machine: 0 },
    total_energy_kwh: 7.8,
    estimated_cost: 62.4,
  },
];

describe("export", () => {
  it("maps records to labelled rows", () => {
    expect(toExportRows(records)[1]).toEqual({
      "Date": "2026-10-19",
      "Day of Week": "Monday",
      "Lights": 5,
      "Fans": 2,
      "TVs": 1,
      "Air Conditioners": 1,
      "Refrigerators": 1,
      "Washing Machines": 0,
      "Total Energy (kWh)": 7.8,
      "Estimated Cost": 62.4,
    });
  });

  it("renders a CSV with a header row and one line per day", () => {
    const lines = renderCsv(records).split("\n");

    expect(lines[0]).toBe(
      "Date,Day of Week,Lights,Fans,TVs,Air Conditioners,Refrigerators,Washing Machines,Total Energy (kWh),Estimated Cost"
    );
    expect(lines[1]).toBe("2026-10-18,Sunday,4,2,1,0,1,1,7.3,58.4");
    expect(lines[2]).toBe("2026-10-19,Monday,5,2,1,1,1,0,7.8,62.4");
  });

  it("writes a workbook with an Energy Data sheet", () => {
    const workbook = XLSX.read(renderWorkbook(records), { type: "buffer" });
    const rows = XLSX.utils.sheet_to_json(workbook.Sheets["Energy Data"]);

    expect(workbook.SheetNames).toEqual(["Energy Data"]);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ "Date": "2026-10-18", "Total Energy (kWh)": 7.3 });
  });
});
