import { extname } from "node:path";
import ExcelJS from "exceljs";
import type { CellValue, Worksheet } from "exceljs";
import { DataFormatError } from "../core/errors.js";
import { log } from "../core/logger.js";
import type { AbsorptionMonths, MarketRecord, MarketTable, PricePerArea } from "../types/market.js";

export type RawCell = string | number | boolean | null;

/**
 * Positional layout of the reference sheet (0-based column indices).
 * The sheet carries multi-row, partly blank headers, so header text is never read.
 */
export const MARKET_COLUMNS = {
  region: 0,
  locality: 1,
  pricePerArea: { overall: 8, t1: 9, t2: 10, t3: 11, house: 12 },
  absorptionMonths: { overall: 18, t1: 19, t2: 20, t3: 21, house: 22 },
} as const;

export const MIN_MARKET_COLUMNS = 23;

const SPREADSHEET_EXTENSIONS = new Set([".xlsx", ".xlsm"]);

/**
 * Read the reference spreadsheet at `path` (first worksheet) into a market table.
 * `.csv` files are read with the same positional layout.
 */
export async function loadMarketData(path: string): Promise<MarketTable> {
  const extension = extname(path).toLowerCase();
  const workbook = new ExcelJS.Workbook();

  let worksheet: Worksheet | undefined;
  if (extension === ".csv") {
    worksheet = await workbook.csv.readFile(path);
  } else if (SPREADSHEET_EXTENSIONS.has(extension)) {
    await workbook.xlsx.readFile(path);
    worksheet = workbook.worksheets[0];
  } else {
    throw new DataFormatError(`Unsupported market data file type '${extension || "(none)"}': ${path}`);
  }

  if (!worksheet) {
    throw new DataFormatError(`Market data file has no worksheet: ${path}`, { columnCount: 0 });
  }

  const table = buildMarketTable(worksheetToGrid(worksheet));
  log.info("Market data loaded", { path, localities: table.length });
  return table;
}

/**
 * Normalise a raw cell grid into market records. The first grid row is the header row.
 */
export function buildMarketTable(grid: readonly (readonly RawCell[])[]): MarketTable {
  const columnCount = grid.reduce((max, row) => Math.max(max, row.length), 0);
  if (columnCount < MIN_MARKET_COLUMNS) {
    throw new DataFormatError(
      `Unexpected market data structure: expected at least ${MIN_MARKET_COLUMNS} columns, found ${columnCount}`,
      { columnCount },
    );
  }

  const records: MarketRecord[] = [];
  let droppedRows = 0;

  for (let index = 1; index < grid.length; index += 1) {
    const row = grid[index];
    const rowNumber = index + 1;

    const localityCell = row[MARKET_COLUMNS.locality] ?? null;
    if (localityCell === null || (typeof localityCell === "string" && localityCell.trim() === "")) {
      droppedRows += 1;
      continue;
    }

    const overall = coerceNumber(row[MARKET_COLUMNS.pricePerArea.overall] ?? null);
    if (overall === undefined) {
      droppedRows += 1;
      continue;
    }

    if (typeof localityCell !== "string") {
      throw new DataFormatError(
        `Unexpected market data structure: row ${rowNumber} has a non-text locality (${String(localityCell)}) next to a numeric price`,
        { columnCount, rowNumber },
      );
    }

    records.push(
      Object.freeze({
        locality: localityCell.trim(),
        region: readText(row[MARKET_COLUMNS.region] ?? null),
        pricePerArea: Object.freeze(readPrices(row, overall)),
        absorptionMonths: Object.freeze(readAbsorption(row)),
        sourceRow: rowNumber,
      }),
    );
  }

  warnOnDuplicates(records);
  if (droppedRows > 0) {
    log.debug("Market data rows without locality or numeric price dropped", { droppedRows });
  }

  return Object.freeze(records);
}

/**
 * Permissive numeric coercion: anything that is not a finite number becomes absent.
 */
export function coerceNumber(value: RawCell): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

// Published zeros mean "no transactions", same as a blank cell
function coercePositive(value: RawCell | undefined): number | undefined {
  const parsed = coerceNumber(value ?? null);
  return parsed !== undefined && parsed > 0 ? parsed : undefined;
}

function readText(value: RawCell): string {
  if (value === null) {
    return "";
  }
  return String(value).trim();
}

function readPrices(row: readonly RawCell[], overall: number): PricePerArea {
  const columns = MARKET_COLUMNS.pricePerArea;
  return {
    overall,
    t1: coercePositive(row[columns.t1]),
    t2: coercePositive(row[columns.t2]),
    t3: coercePositive(row[columns.t3]),
    house: coercePositive(row[columns.house]),
  };
}

function readAbsorption(row: readonly RawCell[]): AbsorptionMonths {
  const columns = MARKET_COLUMNS.absorptionMonths;
  return {
    overall: coercePositive(row[columns.overall]),
    t1: coercePositive(row[columns.t1]),
    t2: coercePositive(row[columns.t2]),
    t3: coercePositive(row[columns.t3]),
    house: coercePositive(row[columns.house]),
  };
}

function warnOnDuplicates(records: readonly MarketRecord[]): void {
  const seen = new Map<string, number>();
  for (const record of records) {
    const key = record.locality.toLocaleLowerCase("pt-PT");
    const firstRow = seen.get(key);
    if (firstRow === undefined) {
      seen.set(key, record.sourceRow);
    } else {
      log.warn("Duplicate locality in market data; the first row wins", {
        locality: record.locality,
        firstRow,
        duplicateRow: record.sourceRow,
      });
    }
  }
}

function worksheetToGrid(worksheet: Worksheet): RawCell[][] {
  const columnCount = worksheet.columnCount;
  const grid: RawCell[][] = [];

  worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    const cells: RawCell[] = [];
    for (let column = 1; column <= columnCount; column += 1) {
      cells.push(toRawCell(row.getCell(column).value));
    }
    grid[rowNumber - 1] = cells;
  });

  // eachRow skips rows past the last one it knows about; fill any gaps
  for (let index = 0; index < grid.length; index += 1) {
    if (grid[index] === undefined) {
      grid[index] = [];
    }
  }

  return grid;
}

function toRawCell(value: CellValue | undefined): RawCell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("formula" in value || "sharedFormula" in value) {
    return value.result === undefined ? null : toRawCell(value.result);
  }
  if ("hyperlink" in value) {
    return typeof value.text === "string" ? value.text : null;
  }
  // Cell errors (#N/A, #DIV/0!, ...)
  return null;
}
