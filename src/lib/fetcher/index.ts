/**
 * Fetcher module - retrieves the survey export over HTTP or from disk
 */

import { readFile } from "fs/promises";
import type { SourceConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { FetchError, FileIOError, errorMessage } from "../../utils/errors.js";
import type { ExportPayload, FetchImpl } from "./types.js";

export * from "./types.js";

const DIAGNOSTIC_HINTS = [
  "the export username and password",
  "the export URL",
  "network connectivity to the export host",
];

/**
 * Build a Basic auth header, or nothing when no credentials are configured
 */
export function basicAuthHeader(source: SourceConfig): string | undefined {
  if (!source.username && !source.password) return undefined;
  const token = Buffer.from(
    `${source.username ?? ""}:${source.password ?? ""}`,
    "utf8",
  ).toString("base64");
  return `Basic ${token}`;
}

/**
 * Sanitize URL for logging (remove credentials and query string)
 */
function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return "<invalid url>";
  }
}

/**
 * Download the export. Anything other than HTTP 200 is fatal for the run.
 */
export async function fetchExport(
  source: SourceConfig,
  fetchImpl: FetchImpl = fetch,
): Promise<ExportPayload> {
  const location = sanitizeUrl(source.url);
  logger.info("Fetching survey export", { url: location });

  const headers: Record<string, string> = { Accept: "text/csv" };
  const authorization = basicAuthHeader(source);
  if (authorization) {
    headers.Authorization = authorization;
  }

  let response: Response;
  try {
    response = await fetchImpl(source.url, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(source.timeoutMs),
    });
  } catch (error) {
    logger.error("Export request failed", error);
    throw new FetchError(
      `Failed to fetch survey export: ${errorMessage(error)}`,
      { url: location, check: DIAGNOSTIC_HINTS },
      { cause: error },
    );
  }

  if (response.status !== 200) {
    logger.error(
      `Export request returned status ${response.status}. Check ${DIAGNOSTIC_HINTS.join(", ")}`,
    );
    throw new FetchError(
      `Failed to fetch survey export. Status code: ${response.status}`,
      { url: location, status: response.status, check: DIAGNOSTIC_HINTS },
    );
  }

  const body = await response.text();
  logger.info("Survey export fetched", { bytes: Buffer.byteLength(body) });

  return { body, location };
}

/**
 * Read an export previously saved to disk
 */
export async function readExportFile(path: string): Promise<ExportPayload> {
  logger.info("Reading survey export from file", { path });
  try {
    const body = await readFile(path, "utf-8");
    return { body, location: path };
  } catch (error) {
    throw new FileIOError(
      `Failed to read export file: ${path}`,
      { path },
      { cause: error },
    );
  }
}
