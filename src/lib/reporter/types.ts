/**
 * Reporter module types
 */

import type { RunManifest } from "../../types/data-model.js";

export interface ReporterResult {
  manifest: RunManifest;
  path: string;
}
