export const NOT_AVAILABLE = "N/A";
export const UNKNOWN = "Unknown";
export const UNSUPPORTED = "Unsupported on this system.";

/**
 * Outcome of a best-effort lookup. `value` is always displayable; `present`
 * says whether the lookup could run at all.
 */
export interface Detected<T> {
  value: T;
  present: boolean;
}

export interface SystemSnapshot {
  readonly osName: string;
  readonly kernel: string;
  readonly hostname: string;
  readonly uptime: string;
  readonly ramInfo: string;
  readonly cpuName: string;
  readonly gpu: Readonly<Detected<string>>;
  readonly diskInfo: string;
  readonly temperature: string;
}

export type FieldName =
  | "os"
  | "kernel"
  | "hostname"
  | "uptime"
  | "ram"
  | "cpu"
  | "gpu"
  | "disk"
  | "temp";

export type OutputFormat = "terminal" | "json";

export interface CollectOptions {
  /** Show RAM as a percentage instead of used/total. */
  ramPercent?: boolean;
  includeDisk?: boolean;
  includeTemp?: boolean;
}

/** Keys of the exported JSON document, in output order. */
export const EXPORT_KEYS = [
  "OS",
  "Kernel",
  "Hostname",
  "Uptime",
  "CPU",
  "RAM",
  "GPU",
  "Disk",
  "Temp",
] as const;

export type ExportKey = (typeof EXPORT_KEYS)[number];

export type ExportDocument = Record<ExportKey, string>;
