import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  buildToolResponse,
  evaluateFlipInputShape,
  handleEvaluateFlip,
  handleListLocalities,
  listLocalitiesInputShape,
} from "./tools.js";
import type { ToolContext } from "./tools.js";

export function createFlipServer(ctx: ToolContext): McpServer {
  const server = new McpServer({ name: "flip-case-mcp", version: "0.1.0" });

  server.registerTool(
    "flip.list_localities",
    {
      title: "List Localities",
      description: "List the municipalities (concelhos) covered by the reference market data. Use before flip.evaluate to pick a valid locality.",
      inputSchema: listLocalitiesInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        openWorldHint: false,
        idempotentHint: true,
      },
    },
    async (args) => buildToolResponse(await handleListLocalities(ctx, args)),
  );

  server.registerTool(
    "flip.evaluate",
    {
      title: "Evaluate Flip",
      description:
        "Evaluate buying, renovating and reselling a Portuguese residential property. Returns the business case at the asking price, the maximum purchase price that meets the target net margin, stress tests and alerts.",
      inputSchema: evaluateFlipInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        openWorldHint: false,
        idempotentHint: true,
      },
    },
    async (args) => buildToolResponse(await handleEvaluateFlip(ctx, args)),
  );

  return server;
}
