/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import path from "node:path";
import { getChartOutputDir } from "@plotwire/config";
import { logger } from "@/common/logger";
import type { ServerConfig } from "@/config";
import { buildChartUrl } from "./chartUrl";
import { fetchChartImage, saveChartImage, type FetchLike } from "./chartImageFetcher";
import { prepareChartInput, prepareRawChartConfig, type PreparedChart } from "./chartNormalizer";
import { assertWritableDirectory, resolveChartOutputPath } from "./chartOutputPath";

export type ChartServiceDeps = {
  config: Pick<ServerConfig, "quickchartBaseUrl" | "render">;
  /** Fetch implementation, global fetch by default. */
  fetch?: FetchLike;
  /** Clock used for default file names. */
  now?: () => Date;
  /** Default download directory. */
  outputDir?: () => string;
};

export type ChartRequestOptions = {
  /** Save the image and return its path instead of the URL. */
  download?: boolean;
  /** Target file when downloading. */
  outputPath?: string;
};

/** Create the chart service shared by every tool surface. */
export function createChartService(deps: ChartServiceDeps) {
  const fetchImpl = deps.fetch ?? fetch;
  const now = deps.now ?? (() => new Date());
  const outputDir = deps.outputDir ?? (() => getChartOutputDir());

  const render = async (prepared: PreparedChart, options: ChartRequestOptions): Promise<string> => {
    const url = buildChartUrl(prepared.config, {
      baseUrl: deps.config.quickchartBaseUrl,
      ...deps.config.render,
    });
    logger.debug({ mode: prepared.mode, chartType: prepared.chartType, urlLength: url.length }, "Chart URL built");
    if (!options.download) return url;

    const outputPath = resolveChartOutputPath({
      outputPath: options.outputPath,
      chartType: prepared.chartType,
      title: prepared.title,
      defaultDir: outputDir,
      now: now(),
    });
    // 逻辑：先校验目录再请求远端，目录不可用时不发起网络请求。
    await assertWritableDirectory(path.dirname(outputPath));
    const bytes = await fetchChartImage(url, fetchImpl);
    await saveChartImage(outputPath, bytes);
    logger.info({ outputPath, bytes: bytes.byteLength }, "Chart image saved");
    return outputPath;
  };

  return {
    /** Validate and normalize a chart description, then render it. */
    async generateChart(chartInput: unknown, options: ChartRequestOptions = {}): Promise<string> {
      return render(prepareChartInput(chartInput), options);
    },
    /** Render a finished renderer config as-is. */
    async generateChartFromConfig(config: unknown, options: ChartRequestOptions = {}): Promise<string> {
      return render(prepareRawChartConfig(config), options);
    },
  };
}

export type ChartService = ReturnType<typeof createChartService>;
