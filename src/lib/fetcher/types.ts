/**
 * Fetcher module types
 */

/**
 * Minimal fetch signature, so tests can stand in for the network
 */
export type FetchImpl = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface ExportPayload {
  body: string;
  location: string; // URL or file path the export came from
}
