/**
 * peakfetch — system information at a glance
 *
 * Programmatic API for scripts that want the snapshot without the CLI.
 *
 * @example
 * ```typescript
 * import { collect, formatSnapshot, exportSnapshot } from 'peakfetch';
 *
 * const snapshot = collect({ ramPercent: true, includeDisk: true });
 * console.log(snapshot.gpu.present ? snapshot.gpu.value : "no lspci");
 *
 * console.log(formatSnapshot(snapshot, 'json'));
 * exportSnapshot(snapshot, './system.json');
 * ```
 */

import type { CollectOptions, OutputFormat, SystemSnapshot } from "./core/models.js";
import { CollectContext } from "./core/context.js";
import { SystemInfoCollector } from "./core/collector.js";
import { renderReport } from "./report/index.js";

export function collect(options: CollectOptions = {}): SystemSnapshot {
  return new SystemInfoCollector().collect(new CollectContext(options));
}

export function formatSnapshot(snapshot: SystemSnapshot, format: OutputFormat): string {
  return renderReport(snapshot, format);
}

export { exportSnapshot, buildReportLines, pairWithBanner, toExportDocument } from "./report/index.js";
export { formatUptime } from "./utils/format.js";
export { SystemInfoCollector } from "./core/collector.js";
export { CollectContext } from "./core/context.js";
export { PeakfetchError, ExportError } from "./core/errors.js";
export {
  type SystemSnapshot,
  type CollectOptions,
  type OutputFormat,
  type Detected,
  type ExportDocument,
  EXPORT_KEYS,
  NOT_AVAILABLE,
  UNKNOWN,
  UNSUPPORTED,
} from "./core/models.js";
