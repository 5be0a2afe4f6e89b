import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const repoRoot = path.resolve(__dirname, "..", "..", "..");

export const PORT = Number(process.env.PORT ?? 8000);

export const MCP_PATH = "/mcp";

// Reference spreadsheet; relative paths resolve from the repo root
export const MARKET_DATA_PATH = path.resolve(repoRoot, process.env.FLIP_MARKET_DATA_PATH ?? path.join("data", "market-data.xlsx"));
