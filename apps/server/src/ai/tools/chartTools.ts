import { tool, zodSchema } from "ai";
import { chartConfigToolDef, chartGenerateToolDef } from "@plotwire/api/types/tools/chart";
import type { ChartService } from "@/modules/chart/chartService";
import { runChartTool } from "@/modules/chart/chartToolRunner";

/** Chart tool output payload. */
type ChartToolOutput = {
  ok: true;
  data: {
    /** "url" when the chart was not downloaded. */
    kind: "url" | "file";
    value: string;
  };
};

/** Chart tools for in-process AI SDK agents. */
export function createChartTools(service: ChartService) {
  const generateChart = tool({
    description: chartGenerateToolDef.description,
    inputSchema: zodSchema(chartGenerateToolDef.parameters),
    execute: async ({ chart_input, download, output_path }): Promise<ChartToolOutput> => {
      const value = await runChartTool(chartGenerateToolDef.id, () =>
        service.generateChart(chart_input, { download, outputPath: output_path }),
      );
      return { ok: true, data: { kind: download ? "file" : "url", value } };
    },
  });

  const generateChartFromConfig = tool({
    description: chartConfigToolDef.description,
    inputSchema: zodSchema(chartConfigToolDef.parameters),
    execute: async ({ config, download, output_path }): Promise<ChartToolOutput> => {
      const value = await runChartTool(chartConfigToolDef.id, () =>
        service.generateChartFromConfig(config, { download, outputPath: output_path }),
      );
      return { ok: true, data: { kind: download ? "file" : "url", value } };
    },
  });

  return {
    [chartGenerateToolDef.id]: generateChart,
    [chartConfigToolDef.id]: generateChartFromConfig,
  };
}
