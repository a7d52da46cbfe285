/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { promises as fs } from "node:fs";
import { OutputPathError, RemoteFetchError } from "./chartErrors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Download rendered chart bytes. No retry: the first failure is reported. */
export async function fetchChartImage(url: string, fetchImpl: FetchLike = fetch): Promise<Uint8Array> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new RemoteFetchError("transport", `Failed to fetch chart: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!response.ok) {
    throw new RemoteFetchError("status", `Failed to fetch chart: HTTP ${response.status}`, {
      status: response.status,
    });
  }
  try {
    return new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    throw new RemoteFetchError("transport", `Failed to read chart body: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/** Write chart bytes to disk. */
export async function saveChartImage(filePath: string, bytes: Uint8Array): Promise<void> {
  try {
    await fs.writeFile(filePath, bytes);
  } catch (error) {
    throw new OutputPathError("write_failed", filePath, `Failed to write chart image: ${filePath}`, {
      cause: error,
    });
  }
}
