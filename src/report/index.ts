import type { SystemSnapshot, OutputFormat } from "../core/models.js";
import { renderTerminal } from "./terminal.js";
import { renderJSON } from "./json.js";

export function renderReport(snapshot: SystemSnapshot, format: OutputFormat): string {
  switch (format) {
    case "json":
      return renderJSON(snapshot);
    case "terminal":
    default:
      return renderTerminal(snapshot);
  }
}

export { renderTerminal, buildReportLines, pairWithBanner, type BannerRow } from "./terminal.js";
export { renderJSON, toExportDocument } from "./json.js";
export { exportSnapshot } from "./export.js";
