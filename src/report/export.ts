import { writeFileSync } from "node:fs";
import type { SystemSnapshot } from "../core/models.js";
import { ExportError } from "../core/errors.js";
import { renderJSON } from "./json.js";

/** Writes the snapshot as JSON, replacing any existing file. */
export function exportSnapshot(snapshot: SystemSnapshot, filePath: string): void {
  try {
    writeFileSync(filePath, renderJSON(snapshot) + "\n", "utf-8");
  } catch (err) {
    throw new ExportError(filePath, err);
  }
}
