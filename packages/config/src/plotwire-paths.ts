/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import fs from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { getEnvString } from "./env";

let rootOverride: string | null = null;

/** Override the Plotwire root directory (tests only). */
export function setPlotwireRootOverride(root: string | null): void {
  rootOverride = root;
}

/** Resolve the Plotwire root directory and ensure it exists. */
export function getPlotwireRootDir(): string {
  const root = rootOverride ?? path.join(homedir(), ".plotwire");
  // 中文注释：统一根目录，缺失时自动创建。
  fs.mkdirSync(root, { recursive: true });
  return root;
}

/** Resolve a path under the Plotwire root directory. */
export function resolvePlotwirePath(...segments: string[]): string {
  return path.join(getPlotwireRootDir(), ...segments);
}

/**
 * Resolve the default directory for downloaded chart images and ensure it exists.
 * `PLOTWIRE_OUTPUT_DIR` wins over `<root>/charts`.
 */
export function getChartOutputDir(env: Record<string, string | undefined> = process.env): string {
  const override = getEnvString(env, "PLOTWIRE_OUTPUT_DIR");
  const dir = override ? path.resolve(override) : resolvePlotwirePath("charts");
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}
