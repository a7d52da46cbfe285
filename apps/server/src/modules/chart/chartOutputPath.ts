/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { constants, promises as fs, type Stats } from "node:fs";
import path from "node:path";
import { logger } from "@/common/logger";
import { OutputPathError } from "./chartErrors";

const pad2 = (value: number) => String(value).padStart(2, "0");

/** Format a local timestamp as `YYYY-MM-DD_HH-MM-SS`. */
export function formatChartTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}-${pad2(date.getMinutes())}-${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** Keep letters, digits, spaces, `-` and `_`; then trim and turn spaces into `_`. */
export function sanitizeFileNamePart(value: string): string {
  return value
    .replace(/[^\p{L}\p{N} _-]/gu, "_")
    .trim()
    .replace(/ /g, "_");
}

/** `<chartType>[_<title>]_<timestamp>.png` */
export function buildDefaultChartFileName(input: {
  chartType: string;
  title?: string;
  now: Date;
}): string {
  const parts = [sanitizeFileNamePart(input.chartType) || "chart"];
  const safeTitle = input.title ? sanitizeFileNamePart(input.title) : "";
  if (safeTitle) parts.push(safeTitle);
  parts.push(formatChartTimestamp(input.now));
  return `${parts.join("_")}.png`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Resolve the default directory; creation failures surface as OutputPathError. */
function resolveDefaultDir(defaultDir: () => string): string {
  try {
    return defaultDir();
  } catch (error) {
    const failedPath = isErrnoException(error) ? (error.path ?? "") : "";
    const blocked = isErrnoException(error) && (error.code === "ENOTDIR" || error.code === "EEXIST");
    const message = error instanceof Error ? error.message : String(error);
    throw new OutputPathError(
      blocked ? "not_directory" : "not_writable",
      failedPath,
      `Cannot create output directory: ${message}`,
      { cause: error },
    );
  }
}

/** Resolve where a downloaded chart goes. */
export function resolveChartOutputPath(input: {
  /** Caller supplied path. */
  outputPath?: string;
  chartType: string;
  title?: string;
  /** Lazily resolved default directory. */
  defaultDir: () => string;
  now: Date;
}): string {
  const explicit = input.outputPath?.trim();
  if (explicit) return path.resolve(explicit);
  const filePath = path.join(
    resolveDefaultDir(input.defaultDir),
    buildDefaultChartFileName({ chartType: input.chartType, title: input.title, now: input.now }),
  );
  logger.info({ outputPath: filePath }, "No output path provided, using default");
  return filePath;
}

/** Ensure `dir` exists, is a directory and is writable. */
export async function assertWritableDirectory(dir: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new OutputPathError("missing", dir, `Output directory does not exist: ${dir}`, {
        cause: error,
      });
    }
    throw new OutputPathError("not_writable", dir, `Output directory is not accessible: ${dir}`, {
      cause: error,
    });
  }
  if (!stats.isDirectory()) {
    throw new OutputPathError("not_directory", dir, `Output path parent is not a directory: ${dir}`);
  }
  try {
    await fs.access(dir, constants.W_OK);
  } catch (error) {
    throw new OutputPathError("not_writable", dir, `Output directory is not writable: ${dir}`, {
      cause: error,
    });
  }
}
