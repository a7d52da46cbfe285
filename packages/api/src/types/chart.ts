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

/** Chart types accepted by the renderer. */
export const CHART_TYPES = [
  "bar",
  "line",
  "pie",
  "doughnut",
  "radar",
  "polarArea",
  "scatter",
  "bubble",
  "radialGauge",
  "speedometer",
] as const;

export const chartTypeSchema = z
  .enum(CHART_TYPES)
  .describe("Chart type: bar, line, pie, doughnut, radar, polarArea, scatter, bubble, radialGauge or speedometer.");

export type ChartType = z.infer<typeof chartTypeSchema>;

/** Chart types whose points are plain numbers. */
export const SCALAR_CHART_TYPES = [
  "bar",
  "line",
  "pie",
  "doughnut",
  "radar",
  "polarArea",
] as const satisfies readonly ChartType[];

/** Chart types that display a single value. */
export const GAUGE_CHART_TYPES = ["radialGauge", "speedometer"] as const satisfies readonly ChartType[];

export const dataPointSchema = z
  .union([z.number(), z.array(z.number())])
  .describe("A number; [x, y] for scatter; [x, y] or [x, y, r] for bubble.");

export type DataPoint = z.infer<typeof dataPointSchema>;

const colorSchema = z.union([z.string(), z.array(z.string())]);

export const datasetSchema = z
  .object({
    label: z.string().default("").describe("Dataset name."),
    data: z.array(dataPointSchema).describe("Data points (must not be empty)."),
    backgroundColor: colorSchema.optional().describe("Fill color, or one color per data point."),
    borderColor: colorSchema.optional().describe("Border color, or one color per data point."),
    additionalConfig: z
      .record(z.string(), z.unknown())
      .optional()
      .describe("Extra Chart.js dataset fields, merged into the dataset; these win over same-named fields."),
  })
  .catchall(z.unknown());

export type Dataset = z.infer<typeof datasetSchema>;

export const chartInputSchema = z.object({
  type: chartTypeSchema,
  datasets: z.array(datasetSchema).min(1).describe("Datasets (at least one)."),
  labels: z.array(z.string()).optional().describe("X-axis or slice labels."),
  title: z.string().optional().describe("Chart title."),
  options: z
    .record(z.string(), z.unknown())
    .optional()
    .describe("Chart.js options, passed through as-is."),
});

export type ChartInput = z.infer<typeof chartInputSchema>;

/** One dataset record as sent to the renderer. */
export type ChartDatasetConfig = Record<string, unknown>;

/** Normalized configuration object in the renderer's schema. */
export type ChartConfig = {
  type: ChartType;
  data: {
    labels: string[];
    datasets: ChartDatasetConfig[];
  };
  options: Record<string, unknown>;
};

/** Configuration object passed through without normalization. */
export type RawChartConfig = Record<string, unknown>;
