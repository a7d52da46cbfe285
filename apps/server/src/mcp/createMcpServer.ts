import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerConfig } from "@/config";
import { createChartService, type ChartService } from "@/modules/chart/chartService";
import serverPackage from "../../package.json";
import { registerChartTools } from "./registerChartTools";

export const SERVER_NAME = "plotwire";
export const SERVER_VERSION: string = serverPackage.version;

/**
 * Create an MCP server with the chart tools registered.
 * One instance per transport connection; the chart service may be shared.
 */
export function createMcpServer(options: { config: ServerConfig; service?: ChartService }): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerChartTools(server, {
    service: options.service ?? createChartService({ config: options.config }),
    mode: options.config.toolMode,
  });
  return server;
}
