/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
/**
 * Chart config normalizer.
 *
 * Two entry points share one output type ({@link PreparedChart}):
 * - `prepareChartInput` parses a structured chart description, applies the per-type
 *   data rules and builds the renderer config;
 * - `prepareRawChartConfig` accepts a finished renderer config and only checks that it is
 *   a non-empty object. It never repairs the config; the renderer decides what is valid.
 */
import {
  CHART_TYPES,
  GAUGE_CHART_TYPES,
  SCALAR_CHART_TYPES,
  chartInputSchema,
  type ChartConfig,
  type ChartDatasetConfig,
  type ChartInput,
  type ChartType,
  type DataPoint,
  type Dataset,
  type RawChartConfig,
} from "@plotwire/api";
import type { ZodIssue } from "zod";
import { InputValidationError } from "./chartErrors";

/** Value formatter injected into gauge data labels. */
export const GAUGE_VALUE_FORMATTER = "(value) => value";

/** Output of both normalizer entry points. */
export type PreparedChart = {
  mode: "strict" | "lenient";
  /** Config object sent to the renderer. */
  config: ChartConfig | RawChartConfig;
  /** Chart type used for default file naming. */
  chartType: string;
  /** Title used for default file naming. */
  title?: string;
};

type CoordinateChartType = "scatter" | "bubble";

type PointFormat = { min: number; max: number; label: string };

const COORDINATE_FORMATS: Record<CoordinateChartType, PointFormat> = {
  scatter: { min: 2, max: 2, label: "[x, y]" },
  bubble: { min: 2, max: 3, label: "[x, y] or [x, y, r]" },
};

/** Any legal point shape; applies to the gauge datasets after the first. */
const ANY_POINT_FORMAT: PointFormat = { min: 2, max: 3, label: "a number, [x, y] or [x, y, r]" };

const scalarChartTypes: readonly ChartType[] = SCALAR_CHART_TYPES;
const gaugeChartTypes: readonly ChartType[] = GAUGE_CHART_TYPES;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isGaugeType(type: ChartType): boolean {
  return gaugeChartTypes.includes(type);
}

function isCoordinateType(type: ChartType): type is CoordinateChartType {
  return type === "scatter" || type === "bubble";
}

/** Map the first zod issue onto a validation error naming the offending location. */
function toInputValidationError(issues: ZodIssue[]): InputValidationError {
  const issue = issues[0];
  if (!issue) {
    return new InputValidationError("Invalid chart input", { rule: "invalid_input" });
  }
  const [head, datasetIndex, field, pointIndex] = issue.path;
  if (head === "type" && issue.code === "invalid_enum_value") {
    return new InputValidationError(
      `Unknown chart type: ${String(issue.received)}. Expected one of: ${CHART_TYPES.join(", ")}`,
      { rule: "unknown_chart_type", expected: CHART_TYPES.join(" | ") },
    );
  }
  const location = issue.path.length > 0 ? issue.path.join(".") : "chart_input";
  const onPoint = head === "datasets" && field === "data" && typeof pointIndex === "number";
  return new InputValidationError(`Invalid chart input at ${location}: ${issue.message}`, {
    rule: "invalid_input",
    datasetIndex: head === "datasets" && typeof datasetIndex === "number" ? datasetIndex : undefined,
    pointIndex: onPoint ? pointIndex : undefined,
    expected: onPoint ? "a number or an array of numbers" : undefined,
  });
}

/** Parse an untrusted chart description. Unknown chart types are rejected here. */
export function parseChartInput(raw: unknown): ChartInput {
  if (!isRecord(raw)) {
    throw new InputValidationError("Chart input must be an object", {
      rule: "invalid_input",
      expected: "an object with type and datasets",
    });
  }
  const result = chartInputSchema.safeParse(raw);
  if (!result.success) throw toInputValidationError(result.error.issues);
  return result.data;
}

function validateGauge(input: ChartInput): void {
  const values = input.datasets[0]?.data ?? [];
  if (values.length !== 1) {
    throw new InputValidationError(
      `${input.type} requires a single numeric value, got ${values.length} in dataset 0`,
      { rule: "gauge_value_count", datasetIndex: 0, expected: "exactly one number" },
    );
  }
  if (typeof values[0] !== "number") {
    throw new InputValidationError(`${input.type} requires a single numeric value in dataset 0`, {
      rule: "scalar_expected",
      datasetIndex: 0,
      pointIndex: 0,
      expected: "a number",
    });
  }
}

function assertPointArity(
  type: ChartType,
  point: number[],
  format: PointFormat,
  datasetIndex: number,
  pointIndex: number,
): void {
  if (point.length < format.min || point.length > format.max) {
    throw new InputValidationError(
      `${type} requires data points in ${format.label} format, got ${point.length} values (dataset ${datasetIndex}, point ${pointIndex})`,
      { rule: "point_arity", datasetIndex, pointIndex, expected: format.label },
    );
  }
}

function validatePoint(
  type: ChartType,
  point: DataPoint,
  datasetIndex: number,
  pointIndex: number,
): void {
  const where = `(dataset ${datasetIndex}, point ${pointIndex})`;
  if (scalarChartTypes.includes(type)) {
    if (Array.isArray(point)) {
      throw new InputValidationError(
        `${type} requires data to be a list of numbers, not coordinate points ${where}`,
        { rule: "scalar_expected", datasetIndex, pointIndex, expected: "a number" },
      );
    }
    return;
  }
  if (!isCoordinateType(type)) {
    if (Array.isArray(point)) assertPointArity(type, point, ANY_POINT_FORMAT, datasetIndex, pointIndex);
    return;
  }
  const format = COORDINATE_FORMATS[type];
  if (!Array.isArray(point)) {
    throw new InputValidationError(`${type} requires data points in ${format.label} format ${where}`, {
      rule: "point_expected",
      datasetIndex,
      pointIndex,
      expected: format.label,
    });
  }
  assertPointArity(type, point, format, datasetIndex, pointIndex);
}

/** Apply the per-chart-type data rules. Throws on the first violation. */
export function validateChartInput(input: ChartInput): void {
  input.datasets.forEach((dataset, datasetIndex) => {
    if (dataset.data.length === 0) {
      throw new InputValidationError(`Dataset ${datasetIndex} has no data points`, {
        rule: "empty_data",
        datasetIndex,
        expected: "at least one data point",
      });
    }
  });

  if (isGaugeType(input.type)) validateGauge(input);

  input.datasets.forEach((dataset, datasetIndex) => {
    dataset.data.forEach((point, pointIndex) => {
      validatePoint(input.type, point, datasetIndex, pointIndex);
    });
  });
}

/** Build one renderer dataset; additionalConfig wins over stray extras, which win over explicit fields. */
function toDatasetConfig(dataset: Dataset): ChartDatasetConfig {
  const { label, data, backgroundColor, borderColor, additionalConfig, ...extras } = dataset;
  const record: ChartDatasetConfig = {
    label,
    data: data.map((point) => (Array.isArray(point) ? [...point] : point)),
  };
  if (backgroundColor !== undefined) record.backgroundColor = backgroundColor;
  if (borderColor !== undefined) record.borderColor = borderColor;
  return { ...record, ...extras, ...(additionalConfig ?? {}) };
}

function withGaugeDataLabels(plugins: unknown): Record<string, unknown> {
  const next: Record<string, unknown> = isRecord(plugins) ? { ...plugins } : {};
  // 逻辑：调用方已配置 datalabels 时保持原样。
  if (next.datalabels === undefined) {
    next.datalabels = { display: true, formatter: GAUGE_VALUE_FORMATTER };
  }
  return next;
}

/** Convert a chart description into the renderer config. Pure; the input is never mutated. */
export function normalizeChartInput(input: ChartInput): ChartConfig {
  validateChartInput(input);

  const options: Record<string, unknown> = { ...(input.options ?? {}) };
  if (input.title && !Object.hasOwn(options, "title")) {
    options.title = { display: true, text: input.title };
  }
  if (isGaugeType(input.type)) {
    options.plugins = withGaugeDataLabels(options.plugins);
  }

  return {
    type: input.type,
    data: {
      labels: [...(input.labels ?? [])],
      datasets: input.datasets.map(toDatasetConfig),
    },
    options,
  };
}

/** Strict entry point: parse, validate and normalize. */
export function prepareChartInput(raw: unknown): PreparedChart {
  const input = parseChartInput(raw);
  return {
    mode: "strict",
    config: normalizeChartInput(input),
    chartType: input.type,
    title: input.title || undefined,
  };
}

/** Accept a map or a JSON string holding one; reject empty and non-object values. */
export function parseRawChartConfig(raw: unknown): RawChartConfig {
  if (raw === null || raw === undefined || raw === "") {
    throw new InputValidationError("Config cannot be empty", {
      rule: "invalid_input",
      expected: "a non-empty object",
    });
  }
  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new InputValidationError(
        "Config string is not valid JSON",
        { rule: "invalid_input", expected: "a JSON object" },
        { cause: error },
      );
    }
  }
  if (!isRecord(value)) {
    throw new InputValidationError("Config must be an object", {
      rule: "invalid_input",
      expected: "a non-empty object",
    });
  }
  if (Object.keys(value).length === 0) {
    throw new InputValidationError("Config cannot be empty", {
      rule: "invalid_input",
      expected: "a non-empty object",
    });
  }
  return value;
}

/** Lenient entry point: pass the config through as-is. */
export function prepareRawChartConfig(raw: unknown): PreparedChart {
  const config = parseRawChartConfig(raw);
  const type = config.type;
  return {
    mode: "lenient",
    config,
    chartType: typeof type === "string" && type.trim() ? type : "chart",
  };
}
