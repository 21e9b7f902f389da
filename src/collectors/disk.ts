import { statfsSync } from "node:fs";
import { NOT_AVAILABLE } from "../core/models.js";
import type { CollectContext } from "../core/context.js";
import { formatDecimal, formatUsage, roundTo } from "../utils/format.js";
import { BaseCollector } from "./base.js";

/** The statfs fields disk usage is computed from. */
export interface FsBlocks {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface DiskUsage {
  total: number;
  used: number;
  percent: number;
}

/**
 * Usage as `df` reports it: blocks reserved for root count neither as used
 * nor as free when computing the percentage.
 */
export function diskUsage(stats: FsBlocks): DiskUsage {
  const total = stats.blocks * stats.bsize;
  const used = (stats.blocks - stats.bfree) * stats.bsize;
  const free = stats.bavail * stats.bsize;
  const denominator = used + free;
  const percent = denominator > 0 ? roundTo((used / denominator) * 100, 1) : 0;
  return { total, used, percent };
}

export function formatDisk(usage: DiskUsage): string {
  return `${formatUsage(usage.used, usage.total)} (${formatDecimal(usage.percent)}%)`;
}

export class DiskCollector extends BaseCollector {
  readonly field = "disk" as const;

  constructor(private readonly mountPoint = "/") {
    super();
  }

  collect(ctx: CollectContext): string {
    if (!ctx.includeDisk) return NOT_AVAILABLE;
    return formatDisk(diskUsage(statfsSync(this.mountPoint)));
  }
}
