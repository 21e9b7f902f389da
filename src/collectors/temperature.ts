import { join } from "node:path";
import { NOT_AVAILABLE, UNSUPPORTED } from "../core/models.js";
import type { CollectContext } from "../core/context.js";
import { listDirectory, readTextFile } from "../utils/files.js";
import { formatDecimal } from "../utils/format.js";
import { BaseCollector } from "./base.js";

export const HWMON_ROOT = "/sys/class/hwmon";
export const SENSOR_GROUP = "coretemp";

const TEMP_INPUT = /^temp(\d+)_input$/;

/** First reading of the named hwmon group, in degrees Celsius. */
export function readSensorGroup(hwmonRoot: string, group: string): number | null {
  for (const device of listDirectory(hwmonRoot).sort()) {
    const dir = join(hwmonRoot, device);
    if (readTextFile(join(dir, "name"))?.trim() !== group) continue;

    const inputs = listDirectory(dir)
      .map((entry) => entry.match(TEMP_INPUT))
      .filter((m): m is RegExpMatchArray => m !== null)
      .sort((a, b) => parseInt(a[1], 10) - parseInt(b[1], 10));

    for (const input of inputs) {
      const raw = readTextFile(join(dir, input[0]));
      const millidegrees = raw === null ? NaN : parseInt(raw.trim(), 10);
      if (Number.isFinite(millidegrees)) return millidegrees / 1000;
    }
  }
  return null;
}

export class TemperatureCollector extends BaseCollector {
  readonly field = "temp" as const;

  constructor(
    private readonly hwmonRoot = HWMON_ROOT,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {
    super();
  }

  collect(ctx: CollectContext): string {
    if (!ctx.includeTemp) return NOT_AVAILABLE;
    // hwmon is the only sensor source read here.
    if (this.platform !== "linux") return UNSUPPORTED;

    const celsius = readSensorGroup(this.hwmonRoot, SENSOR_GROUP);
    return celsius === null ? NOT_AVAILABLE : `${formatDecimal(celsius)}°C`;
  }
}
