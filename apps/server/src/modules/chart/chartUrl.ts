/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { ChartConfig, RawChartConfig } from "@plotwire/api";

/** Public QuickChart endpoint. */
export const DEFAULT_QUICKCHART_BASE_URL = "https://quickchart.io/chart";

export type ChartRenderOptions = {
  /** Renderer endpoint, without query string. */
  baseUrl: string;
  /** Image width in CSS pixels. */
  width: number;
  /** Image height in CSS pixels. */
  height: number;
  /** Pixel density multiplier. */
  devicePixelRatio: number;
};

export const DEFAULT_RENDER_SIZE = {
  width: 600,
  height: 300,
  devicePixelRatio: 2,
} as const;

/** Build `<base>?c=<json>&w=&h=&devicePixelRatio=` for a renderer config. */
export function buildChartUrl(config: ChartConfig | RawChartConfig, options: ChartRenderOptions): string {
  // 逻辑：去掉末尾 /，避免拼接出 /chart/?c=。
  const base = options.baseUrl.trim().replace(/\/$/, "");
  const params = new URLSearchParams();
  // 逻辑：c 必须是第一个参数，调用方依赖 `<base>?c=` 前缀。
  params.set("c", JSON.stringify(config));
  params.set("w", String(options.width));
  params.set("h", String(options.height));
  params.set("devicePixelRatio", String(options.devicePixelRatio));
  return `${base}?${params.toString()}`;
}
