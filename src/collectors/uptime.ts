import { uptime } from "node:os";
import { readTextFile } from "../utils/files.js";
import { formatUptime } from "../utils/format.js";
import { BaseCollector } from "./base.js";

export const PROC_STAT_PATH = "/proc/stat";

/** Boot time in epoch seconds, from the `btime` line of /proc/stat. */
export function parseBootTime(procStat: string): number | null {
  const match = procStat.match(/^btime\s+(\d+)/m);
  return match ? parseInt(match[1], 10) : null;
}

export class UptimeCollector extends BaseCollector {
  readonly field = "uptime" as const;

  constructor(
    private readonly procStatPath = PROC_STAT_PATH,
    private readonly now: () => number = Date.now,
  ) {
    super();
  }

  bootTime(nowSeconds: number): number {
    const content = readTextFile(this.procStatPath);
    const btime = content === null ? null : parseBootTime(content);
    return btime ?? nowSeconds - uptime();
  }

  collect(): string {
    const nowSeconds = this.now() / 1000;
    return formatUptime(nowSeconds - this.bootTime(nowSeconds));
  }
}
