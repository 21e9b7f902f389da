import { freemem, totalmem } from "node:os";
import type { CollectContext } from "../core/context.js";
import { readTextFile } from "../utils/files.js";
import { formatDecimal, formatUsage, roundTo } from "../utils/format.js";
import { BaseCollector } from "./base.js";

export const MEMINFO_PATH = "/proc/meminfo";

export interface MemoryUsage {
  total: number;
  used: number;
  percent: number;
}

/** Parses /proc/meminfo into byte counts. Returns null without MemTotal. */
export function parseMeminfo(meminfo: string): MemoryUsage | null {
  const kib = new Map<string, number>();
  for (const line of meminfo.split("\n")) {
    const match = line.match(/^(\w+):\s+(\d+)/);
    if (match) kib.set(match[1], parseInt(match[2], 10) * 1024);
  }

  const total = kib.get("MemTotal");
  if (total === undefined || total === 0) return null;

  const free = kib.get("MemFree") ?? 0;
  const buffers = kib.get("Buffers") ?? 0;
  const cached = (kib.get("Cached") ?? 0) + (kib.get("SReclaimable") ?? 0);
  const available = kib.get("MemAvailable") ?? free + buffers + cached;

  let used = total - free - buffers - cached;
  if (used < 0) used = total - free;

  return {
    total,
    used,
    percent: roundTo(((total - available) / total) * 100, 1),
  };
}

export class MemoryCollector extends BaseCollector {
  readonly field = "ram" as const;

  constructor(private readonly meminfoPath = MEMINFO_PATH) {
    super();
  }

  usage(): MemoryUsage {
    const content = readTextFile(this.meminfoPath);
    const parsed = content === null ? null : parseMeminfo(content);
    if (parsed) return parsed;

    const total = totalmem();
    const used = total - freemem();
    return { total, used, percent: roundTo((used / total) * 100, 1) };
  }

  collect(ctx: CollectContext): string {
    return formatMemory(this.usage(), ctx.ramPercent);
  }
}

export function formatMemory(usage: MemoryUsage, asPercent: boolean): string {
  if (asPercent) return `${formatDecimal(usage.percent)}%`;
  return formatUsage(usage.used, usage.total);
}
