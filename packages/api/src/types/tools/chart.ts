/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { z } from "zod";

// 逻辑：chart_input 在工具入口只校验为对象，图表规则由服务端解析并返回可读错误。
const chartInputWireSchema = z
  .record(z.string(), z.unknown())
  .describe("Chart description: { type, datasets, labels?, title?, options? }.");

const downloadSchema = z
  .boolean()
  .default(false)
  .describe("When true, save the PNG and return its path; otherwise return the chart URL.");

const outputPathSchema = z
  .string()
  .min(1)
  .optional()
  .describe("Where to save the PNG when download is true. Its directory must exist. Defaults to a file named from the chart type, title and timestamp.");

/** Structured chart tool definition. */
export const chartGenerateToolDef = {
  id: "generate_chart",
  name: "Generate chart",
  description: `Generate a chart with QuickChart from a structured description.
Parameters:
- chart_input: { type, datasets, labels?, title?, options? }.
  - type: bar, line, pie, doughnut, radar, polarArea, scatter, bubble, radialGauge, speedometer.
  - datasets[].data: numbers for bar/line/pie/doughnut/radar/polarArea; [x, y] for scatter;
    [x, y] or [x, y, r] for bubble; exactly one number in the first dataset for radialGauge/speedometer.
  - datasets[].additionalConfig: extra Chart.js dataset fields, merged into the dataset.
- download: when true, save the PNG and return its path; otherwise return the chart URL.
- output_path: where to save the PNG when download is true.
Returns: the chart URL, or the saved file path.`,
  parameters: z.object({
    chart_input: chartInputWireSchema,
    download: downloadSchema,
    output_path: outputPathSchema,
  }),
} as const;

/** Raw chart config tool definition. */
export const chartConfigToolDef = {
  id: "generate_chart_from_config",
  name: "Generate chart from config",
  description: `Generate a chart with QuickChart from a complete Chart.js configuration object.
The config is sent to the renderer as-is; only emptiness and object shape are checked.
It must have a "type" (bar, line, pie, doughnut, radar, polarArea, scatter, bubble, radialGauge,
speedometer) and a "data" field with at least one entry in "datasets", e.g.
{"type":"bar","data":{"labels":["Q1","Q2"],"datasets":[{"label":"Revenue","data":[12,19]}]},
"options":{"title":{"display":true,"text":"Revenue"}}}
- download: when true, save the PNG and return its path; otherwise return the chart URL.
- output_path: where to save the PNG when download is true.
Returns: the chart URL, or the saved file path.`,
  parameters: z.object({
    config: z
      .union([z.string(), z.record(z.string(), z.unknown())])
      .describe("Chart.js configuration (object or JSON string)."),
    download: downloadSchema,
    output_path: outputPathSchema,
  }),
} as const;
