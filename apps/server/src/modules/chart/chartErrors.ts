/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
export type ChartErrorCode = "input_invalid" | "output_path_invalid" | "remote_fetch_failed";

/** Validation rule that rejected a chart input. */
export type ChartValidationRule =
  | "invalid_input"
  | "unknown_chart_type"
  | "empty_data"
  | "scalar_expected"
  | "point_expected"
  | "point_arity"
  | "gauge_value_count";

/** Base class of every error a chart tool reports to its caller. */
export class ChartToolError extends Error {
  /** Stable error code for policy handling. */
  readonly code: ChartErrorCode;

  constructor(code: ChartErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

type InputValidationDetail = {
  rule: ChartValidationRule;
  /** Offending dataset index. */
  datasetIndex?: number;
  /** Offending point index inside the dataset. */
  pointIndex?: number;
  /** Human readable shape the rule expected. */
  expected?: string;
};

/** Chart input is malformed or breaks a chart-type rule. */
export class InputValidationError extends ChartToolError {
  readonly rule: ChartValidationRule;
  readonly datasetIndex?: number;
  readonly pointIndex?: number;
  readonly expected?: string;

  constructor(message: string, detail: InputValidationDetail, options?: { cause?: unknown }) {
    super("input_invalid", message, options);
    this.rule = detail.rule;
    this.datasetIndex = detail.datasetIndex;
    this.pointIndex = detail.pointIndex;
    this.expected = detail.expected;
  }
}

export type OutputPathFailure = "missing" | "not_directory" | "not_writable" | "write_failed";

/** Target directory cannot receive the chart image. */
export class OutputPathError extends ChartToolError {
  readonly reason: OutputPathFailure;
  /** Directory or file path involved. */
  readonly path: string;

  constructor(reason: OutputPathFailure, path: string, message: string, options?: { cause?: unknown }) {
    super("output_path_invalid", message, options);
    this.reason = reason;
    this.path = path;
  }
}

/** Renderer returned a non-2xx status or could not be reached. */
export class RemoteFetchError extends ChartToolError {
  readonly kind: "status" | "transport";
  /** HTTP status when kind is "status". */
  readonly status?: number;

  constructor(
    kind: "status" | "transport",
    message: string,
    detail: { status?: number; cause?: unknown } = {},
  ) {
    super("remote_fetch_failed", message, { cause: detail.cause });
    this.kind = kind;
    this.status = detail.status;
  }
}

/** Check if error is one of the chart tool errors. */
export function isChartToolError(error: unknown): error is ChartToolError {
  return error instanceof ChartToolError;
}
