import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import ExcelJS from "exceljs";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { DataFormatError } from "../../src/core/errors.js";
import { buildMarketTable, coerceNumber, loadMarketData } from "../../src/data/market-loader.js";
import type { RawCell } from "../../src/data/market-loader.js";
import { EVORA, HEADER_ROW, LISBOA, PORTO, marketGrid, marketRow } from "../helpers/market-grid.js";

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), "..", "fixtures");

describe("coerceNumber", () => {
  it("accepts finite numbers and numeric strings", () => {
    expect(coerceNumber(2150.5)).toBe(2150.5);
    expect(coerceNumber(" 3100 ")).toBe(3100);
  });

  it("treats text, blanks, booleans and non-finite values as absent", () => {
    expect(coerceNumber("n.d.")).toBeUndefined();
    expect(coerceNumber("")).toBeUndefined();
    expect(coerceNumber(null)).toBeUndefined();
    expect(coerceNumber(true)).toBeUndefined();
    expect(coerceNumber(Number.NaN)).toBeUndefined();
    expect(coerceNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});

describe("buildMarketTable", () => {
  it("rejects a sheet narrower than 23 columns", () => {
    const grid = [HEADER_ROW.slice(0, 22), marketRow(LISBOA).slice(0, 22)];
    let caught: unknown;
    try {
      buildMarketTable(grid);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DataFormatError);
    expect(caught instanceof DataFormatError ? caught.columnCount : undefined).toBe(22);
  });

  it("rejects an empty sheet", () => {
    expect(() => buildMarketTable([])).toThrow(/at least 23 columns, found 0/);
  });

  it("maps columns by position, ignoring header text", () => {
    const grid = marketGrid(LISBOA);
    grid[0] = grid[0].map(() => "???");

    const [record] = buildMarketTable(grid);

    expect(record).toEqual({
      locality: "Lisboa",
      region: "Grande Lisboa",
      pricePerArea: { overall: 5200, t1: 5600, t2: 5100, t3: 4800, house: 6100 },
      absorptionMonths: { overall: 5.5, t1: 4, t2: 5, t3: 7, house: 9 },
      sourceRow: 2,
    });
  });

  it("drops rows whose overall price is not numeric", () => {
    const table = buildMarketTable(
      marketGrid(LISBOA, { locality: "Vila Real", price: { overall: "n.d.", t1: 1500 } }, { locality: "Guarda", price: { overall: null } }),
    );

    expect(table.map((r) => r.locality)).toEqual(["Lisboa"]);
  });

  it("drops rows without a locality", () => {
    const table = buildMarketTable(marketGrid({ locality: null, price: { overall: 2500 } }, { locality: "   ", price: { overall: 2500 } }, PORTO));

    expect(table.map((r) => r.locality)).toEqual(["Porto"]);
  });

  it("keeps rows with a numeric overall price and leaves other fields absent", () => {
    const [record] = buildMarketTable(marketGrid(EVORA));

    expect(record.pricePerArea).toEqual({ overall: 1800, t1: undefined, t2: undefined, t3: undefined, house: undefined });
    expect(record.absorptionMonths.overall).toBeUndefined();
    expect(record.absorptionMonths.t3).toBeUndefined();
  });

  it("coerces numeric text and treats unparseable or zero optional values as absent", () => {
    const [record] = buildMarketTable(
      marketGrid({
        locality: "Braga",
        price: { overall: "2100", t1: "2300", t2: "s/ dados", t3: 0 },
        absorption: { overall: "7.5", t1: "-" },
      }),
    );

    expect(record.pricePerArea.overall).toBe(2100);
    expect(record.pricePerArea.t1).toBe(2300);
    expect(record.pricePerArea.t2).toBeUndefined();
    expect(record.pricePerArea.t3).toBeUndefined();
    expect(record.absorptionMonths.overall).toBe(7.5);
    expect(record.absorptionMonths.t1).toBeUndefined();
  });

  it("trims locality names and keeps duplicates in sheet order", () => {
    const table = buildMarketTable(marketGrid({ ...PORTO, locality: "  Porto " }, { locality: "PORTO", price: { overall: 9999 } }));

    expect(table.map((r) => r.locality)).toEqual(["Porto", "PORTO"]);
    expect(table.map((r) => r.sourceRow)).toEqual([2, 3]);
  });

  it("fails on a numeric locality next to a numeric price", () => {
    const grid = marketGrid(LISBOA, { locality: 1106, price: { overall: 2000 } });

    expect(() => buildMarketTable(grid)).toThrow(/row 3 has a non-text locality/);
  });

  it("returns frozen records", () => {
    const table = buildMarketTable(marketGrid(LISBOA));

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table[0])).toBe(true);
    expect(Object.isFrozen(table[0].pricePerArea)).toBe(true);
  });
});

describe("loadMarketData", () => {
  let workDir: string;

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), "flip-market-"));
  });

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  async function writeWorkbook(fileName: string, rows: RawCell[][]): Promise<string> {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Concelhos");
    for (const row of rows) {
      sheet.addRow(row);
    }
    const path = join(workDir, fileName);
    await workbook.xlsx.writeFile(path);
    return path;
  }

  it("reads the first worksheet of an xlsx file", async () => {
    const path = await writeWorkbook("market.xlsx", marketGrid(LISBOA, PORTO, { locality: "Vila Real", price: { overall: "n.d." } }, EVORA));

    const table = await loadMarketData(path);

    expect(table.map((r) => r.locality)).toEqual(["Lisboa", "Porto", "Évora"]);
    expect(table[1].pricePerArea.t2).toBeUndefined();
    expect(table[1].absorptionMonths.t2).toBe(5.5);
  });

  it("rejects an xlsx file with too few columns", async () => {
    const path = await writeWorkbook("narrow.xlsx", [HEADER_ROW.slice(0, 12), marketRow(LISBOA).slice(0, 12)]);

    await expect(loadMarketData(path)).rejects.toBeInstanceOf(DataFormatError);
  });

  it("reads the csv fixture with the same layout", async () => {
    const table = await loadMarketData(join(fixturesDir, "market-sample.csv"));

    expect(table.map((r) => r.locality)).toEqual(["Lisboa", "Porto", "Évora", "porto"]);
    expect(table[0].pricePerArea.t2).toBe(5100);
    expect(table[0].absorptionMonths.t2).toBe(5);
    expect(table[2].region).toBe("Alentejo");
  });

  it("rejects unsupported file types", async () => {
    await expect(loadMarketData(join(workDir, "market.json"))).rejects.toThrow(/Unsupported market data file type '.json'/);
  });
});
