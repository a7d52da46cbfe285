/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { describe, it, expect } from "vitest";
import { InputValidationError } from "../chartErrors";
import {
  GAUGE_VALUE_FORMATTER,
  normalizeChartInput,
  parseChartInput,
  parseRawChartConfig,
  prepareChartInput,
  prepareRawChartConfig,
} from "../chartNormalizer";

/** Run `fn` and return the InputValidationError it throws. */
function captureValidationError(fn: () => unknown): InputValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InputValidationError) return error;
    throw error;
  }
  throw new Error("expected an InputValidationError");
}

const normalize = (raw: unknown) => normalizeChartInput(parseChartInput(raw));

describe("normalizeChartInput", () => {
  it("normalizes the sales bar chart", () => {
    const config = normalize({
      type: "bar",
      datasets: [{ label: "A", data: [1, 2, 3] }],
      labels: ["x", "y", "z"],
      title: "Sales",
    });
    expect(config).toEqual({
      type: "bar",
      data: {
        labels: ["x", "y", "z"],
        datasets: [{ label: "A", data: [1, 2, 3] }],
      },
      options: { title: { display: true, text: "Sales" } },
    });
  });

  it("is deterministic", () => {
    const input = {
      type: "line",
      datasets: [{ label: "Visits", data: [3, 1, 4], borderColor: "#3366cc" }],
      labels: ["Mon", "Tue", "Wed"],
      title: "Traffic",
      options: { legend: { display: false } },
    };
    expect(normalize(input)).toEqual(normalize(input));
  });

  it("defaults labels and dataset label", () => {
    const config = normalize({ type: "pie", datasets: [{ data: [10, 20] }] });
    expect(config.data.labels).toEqual([]);
    expect(config.data.datasets).toEqual([{ label: "", data: [10, 20] }]);
    expect(config.options).toEqual({});
  });

  it("keeps colors and lets additionalConfig win on collisions", () => {
    const config = normalize({
      type: "bar",
      datasets: [
        {
          label: "Revenue",
          data: [5, 6],
          backgroundColor: ["red", "blue"],
          borderColor: "black",
          borderWidth: 1,
          additionalConfig: { borderColor: "white", borderWidth: 3, stack: "s1" },
        },
      ],
    });
    expect(config.data.datasets[0]).toEqual({
      label: "Revenue",
      data: [5, 6],
      backgroundColor: ["red", "blue"],
      borderColor: "white",
      borderWidth: 3,
      stack: "s1",
    });
  });

  it("keeps stray dataset fields when there is no collision", () => {
    const config = normalize({
      type: "line",
      datasets: [{ label: "Temp", data: [1, 2], fill: false, tension: 0.4 }],
    });
    expect(config.data.datasets[0]).toEqual({ label: "Temp", data: [1, 2], fill: false, tension: 0.4 });
  });

  it("leaves an existing options.title untouched", () => {
    const config = normalize({
      type: "bar",
      datasets: [{ data: [1] }],
      title: "Ignored",
      options: { title: { display: false, text: "Kept" } },
    });
    expect(config.options.title).toEqual({ display: false, text: "Kept" });
  });

  it("does not add a title for an empty title string", () => {
    const config = normalize({ type: "bar", datasets: [{ data: [1] }], title: "" });
    expect(config.options).toEqual({});
  });

  it("does not mutate the caller's options", () => {
    const options = { scales: { y: { beginAtZero: true } } };
    const config = normalize({ type: "bar", datasets: [{ data: [1] }], title: "T", options });
    expect(options).toEqual({ scales: { y: { beginAtZero: true } } });
    expect(config.options).toEqual({
      scales: { y: { beginAtZero: true } },
      title: { display: true, text: "T" },
    });
  });

  it("injects data labels for gauges", () => {
    const config = normalize({ type: "radialGauge", datasets: [{ data: [72] }] });
    expect(config.options).toEqual({
      plugins: { datalabels: { display: true, formatter: GAUGE_VALUE_FORMATTER } },
    });
  });

  it("merges gauge data labels into existing plugins", () => {
    const plugins = { legend: { display: false } };
    const config = normalize({
      type: "speedometer",
      datasets: [{ data: [40] }],
      options: { plugins },
    });
    expect(config.options.plugins).toEqual({
      legend: { display: false },
      datalabels: { display: true, formatter: GAUGE_VALUE_FORMATTER },
    });
    expect(plugins).toEqual({ legend: { display: false } });
  });

  it("replaces non-object gauge plugins", () => {
    const config = normalize({ type: "radialGauge", datasets: [{ data: [1] }], options: { plugins: "none" } });
    expect(config.options.plugins).toEqual({
      datalabels: { display: true, formatter: GAUGE_VALUE_FORMATTER },
    });
  });

  it("keeps caller supplied gauge data labels", () => {
    const config = normalize({
      type: "radialGauge",
      datasets: [{ data: [40] }],
      options: { plugins: { datalabels: { display: false } } },
    });
    expect(config.options.plugins).toEqual({ datalabels: { display: false } });
  });
});

describe("chart type rules", () => {
  it("accepts scalars and rejects sequences for bar", () => {
    expect(normalize({ type: "bar", datasets: [{ data: [5] }] }).data.datasets[0]?.data).toEqual([5]);
    const error = captureValidationError(() =>
      normalize({ type: "bar", datasets: [{ data: [4, [1, 2]] }] }),
    );
    expect(error.rule).toBe("scalar_expected");
    expect(error.datasetIndex).toBe(0);
    expect(error.pointIndex).toBe(1);
    expect(error.expected).toBe("a number");
  });

  it("accepts [x, y] and rejects other shapes for scatter", () => {
    expect(normalize({ type: "scatter", datasets: [{ data: [[1, 2]] }] }).data.datasets[0]?.data).toEqual([
      [1, 2],
    ]);
    const arity = captureValidationError(() =>
      normalize({ type: "scatter", datasets: [{ data: [[1, 2, 3]] }] }),
    );
    expect(arity.rule).toBe("point_arity");
    expect(arity.expected).toBe("[x, y]");
    const scalar = captureValidationError(() =>
      normalize({ type: "scatter", datasets: [{ data: [[1, 2]] }, { data: [7] }] }),
    );
    expect(scalar.rule).toBe("point_expected");
    expect(scalar.datasetIndex).toBe(1);
    expect(scalar.pointIndex).toBe(0);
  });

  it("accepts [x, y] and [x, y, r] and rejects [x] for bubble", () => {
    const config = normalize({
      type: "bubble",
      datasets: [{ data: [[1, 2], [1, 2, 3]] }],
    });
    expect(config.data.datasets[0]?.data).toEqual([[1, 2], [1, 2, 3]]);
    const error = captureValidationError(() => normalize({ type: "bubble", datasets: [{ data: [[1]] }] }));
    expect(error.rule).toBe("point_arity");
    expect(error.expected).toBe("[x, y] or [x, y, r]");
    expect(error.message).toBe(
      "bubble requires data points in [x, y] or [x, y, r] format, got 1 values (dataset 0, point 0)",
    );
  });

  it("requires exactly one value in the first gauge dataset", () => {
    const tooMany = captureValidationError(() =>
      normalize({ type: "radialGauge", datasets: [{ data: [1, 2] }] }),
    );
    expect(tooMany.rule).toBe("gauge_value_count");
    expect(tooMany.message).toBe("radialGauge requires a single numeric value, got 2 in dataset 0");

    const empty = captureValidationError(() => normalize({ type: "speedometer", datasets: [{ data: [] }] }));
    expect(empty.rule).toBe("empty_data");

    const notScalar = captureValidationError(() =>
      normalize({ type: "speedometer", datasets: [{ data: [[1, 2]] }] }),
    );
    expect(notScalar.rule).toBe("scalar_expected");
  });

  it("checks point shapes in the gauge datasets after the first", () => {
    const error = captureValidationError(() =>
      normalize({ type: "radialGauge", datasets: [{ data: [5] }, { data: [[1, 2, 3, 4, 5], []] }] }),
    );
    expect(error.rule).toBe("point_arity");
    expect(error.datasetIndex).toBe(1);
    expect(error.pointIndex).toBe(0);
    expect(error.expected).toBe("a number, [x, y] or [x, y, r]");

    const config = normalize({ type: "speedometer", datasets: [{ data: [5] }, { data: [3, [1, 2]] }] });
    expect(config.data.datasets[1]).toEqual({ label: "", data: [3, [1, 2]] });
  });

  it("rejects empty data for any chart type", () => {
    const error = captureValidationError(() =>
      normalize({ type: "line", datasets: [{ data: [1] }, { label: "B", data: [] }] }),
    );
    expect(error.rule).toBe("empty_data");
    expect(error.datasetIndex).toBe(1);
    expect(error.message).toBe("Dataset 1 has no data points");
  });
});

describe("parseChartInput", () => {
  it("rejects unknown chart types", () => {
    const error = captureValidationError(() => parseChartInput({ type: "heatmap", datasets: [{ data: [1] }] }));
    expect(error.rule).toBe("unknown_chart_type");
    expect(error.message).toBe(
      "Unknown chart type: heatmap. Expected one of: bar, line, pie, doughnut, radar, polarArea, scatter, bubble, radialGauge, speedometer",
    );
  });

  it("rejects a missing datasets list", () => {
    const error = captureValidationError(() => parseChartInput({ type: "bar", datasets: [] }));
    expect(error.rule).toBe("invalid_input");
    expect(error.message.startsWith("Invalid chart input at datasets:")).toBe(true);
  });

  it("names the dataset and point of a non-numeric value", () => {
    const error = captureValidationError(() =>
      parseChartInput({ type: "bar", datasets: [{ data: [1] }, { data: [2, "three"] }] }),
    );
    expect(error.rule).toBe("invalid_input");
    expect(error.datasetIndex).toBe(1);
    expect(error.pointIndex).toBe(1);
  });

  it("rejects non-object input", () => {
    expect(captureValidationError(() => parseChartInput(null)).rule).toBe("invalid_input");
    expect(captureValidationError(() => parseChartInput([1, 2])).rule).toBe("invalid_input");
  });
});

describe("prepareChartInput", () => {
  it("carries chart type and title for file naming", () => {
    const prepared = prepareChartInput({ type: "doughnut", datasets: [{ data: [1, 2] }], title: "Mix" });
    expect(prepared.mode).toBe("strict");
    expect(prepared.chartType).toBe("doughnut");
    expect(prepared.title).toBe("Mix");
  });
});

describe("raw chart config", () => {
  it("passes the config through unchanged", () => {
    const config = { type: "bar", data: { datasets: [{ data: [1, [2, 3]] }] }, extra: true };
    const prepared = prepareRawChartConfig(config);
    expect(prepared.config).toBe(config);
    expect(prepared.mode).toBe("lenient");
    expect(prepared.chartType).toBe("bar");
  });

  it("does not repair malformed configs", () => {
    const config = { data: "not-a-chart" };
    expect(prepareRawChartConfig(config)).toEqual({ mode: "lenient", config, chartType: "chart" });
  });

  it("decodes JSON strings", () => {
    expect(parseRawChartConfig('{"type":"line","data":{"datasets":[]}}')).toEqual({
      type: "line",
      data: { datasets: [] },
    });
  });

  it("rejects empty and non-object configs", () => {
    expect(captureValidationError(() => parseRawChartConfig({})).message).toBe("Config cannot be empty");
    expect(captureValidationError(() => parseRawChartConfig(undefined)).message).toBe("Config cannot be empty");
    expect(captureValidationError(() => parseRawChartConfig([1])).message).toBe("Config must be an object");
    expect(captureValidationError(() => parseRawChartConfig("[1]")).message).toBe("Config must be an object");
    expect(captureValidationError(() => parseRawChartConfig("{oops")).message).toBe(
      "Config string is not valid JSON",
    );
  });
});
