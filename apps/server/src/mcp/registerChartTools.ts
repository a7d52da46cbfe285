/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { chartConfigToolDef, chartGenerateToolDef } from "@plotwire/api/types/tools/chart";
import { logger } from "@/common/logger";
import type { ChartToolMode } from "@/config";
import type { ChartService } from "@/modules/chart/chartService";
import { formatChartToolError, runChartTool } from "@/modules/chart/chartToolRunner";

/** Wrap a tool call into an MCP result; failures become `isError` text results. */
async function toCallToolResult(
  toolId: string,
  fn: () => Promise<string>,
  sessionId?: string,
): Promise<CallToolResult> {
  try {
    const text = await runChartTool(toolId, fn, sessionId);
    return { content: [{ type: "text", text }] };
  } catch (error) {
    return { content: [{ type: "text", text: formatChartToolError(error) }], isError: true };
  }
}

/** Register the chart tools selected by `mode`. Returns the registered tool ids. */
export function registerChartTools(
  server: McpServer,
  options: { service: ChartService; mode: ChartToolMode },
): string[] {
  const { service, mode } = options;
  const registered: string[] = [];

  if (mode !== "lenient") {
    server.registerTool(
      chartGenerateToolDef.id,
      {
        title: chartGenerateToolDef.name,
        description: chartGenerateToolDef.description,
        inputSchema: chartGenerateToolDef.parameters.shape,
      },
      async ({ chart_input, download, output_path }, extra) =>
        toCallToolResult(
          chartGenerateToolDef.id,
          () => service.generateChart(chart_input, { download, outputPath: output_path }),
          extra.sessionId,
        ),
    );
    registered.push(chartGenerateToolDef.id);
  }

  if (mode !== "strict") {
    server.registerTool(
      chartConfigToolDef.id,
      {
        title: chartConfigToolDef.name,
        description: chartConfigToolDef.description,
        inputSchema: chartConfigToolDef.parameters.shape,
      },
      async ({ config, download, output_path }, extra) =>
        toCallToolResult(
          chartConfigToolDef.id,
          () => service.generateChartFromConfig(config, { download, outputPath: output_path }),
          extra.sessionId,
        ),
    );
    registered.push(chartConfigToolDef.id);
  }

  logger.debug({ mode, tools: registered }, "Chart tools registered");
  return registered;
}
