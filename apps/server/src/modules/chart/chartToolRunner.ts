/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { v4 as uuidv4 } from "uuid";
import { logger } from "@/common/logger";
import { runWithRequestContext } from "@/common/requestContext";
import { isChartToolError } from "./chartErrors";

/** Run one chart tool call inside its own request context, logging the outcome. */
export function runChartTool<T>(tool: string, fn: () => Promise<T>, sessionId?: string): Promise<T> {
  return runWithRequestContext({ requestId: uuidv4(), tool, sessionId }, async () => {
    const startedAt = Date.now();
    try {
      const result = await fn();
      logger.info({ durationMs: Date.now() - startedAt }, "Chart tool finished");
      return result;
    } catch (error) {
      if (isChartToolError(error)) {
        logger.warn({ err: error, code: error.code }, "Chart tool rejected");
      } else {
        logger.error({ err: error }, "Chart tool failed unexpectedly");
      }
      throw error;
    }
  });
}

/** Human readable message for a failed tool call. */
export function formatChartToolError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Failed to generate chart: ${message}`;
}
