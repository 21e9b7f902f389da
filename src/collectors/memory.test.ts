import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CollectContext } from "../core/context.js";
import { MemoryCollector, formatMemory, parseMeminfo } from "./memory.js";

const GIB = 1024 ** 3;

// 8 GiB total, 4 free, 1 buffers, 1 cached, 6 available.
const MEMINFO = [
  "MemTotal:        8388608 kB",
  "MemFree:         4194304 kB",
  "MemAvailable:    6291456 kB",
  "Buffers:         1048576 kB",
  "Cached:          1048576 kB",
  "SwapCached:            0 kB",
  "SReclaimable:          0 kB",
  "",
].join("\n");

let dir: string;
let meminfoPath: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "peakfetch-memory-"));
  meminfoPath = join(dir, "meminfo");
  writeFileSync(meminfoPath, MEMINFO);
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseMeminfo", () => {
  it("derives used memory and percent", () => {
    expect(parseMeminfo(MEMINFO)).toEqual({ total: 8 * GIB, used: 2 * GIB, percent: 25 });
  });

  it("counts SReclaimable as cache", () => {
    const usage = parseMeminfo(MEMINFO.replace("SReclaimable:          0 kB", "SReclaimable:     524288 kB"));
    expect(usage?.used).toBe(1.5 * GIB);
  });

  it("returns null without MemTotal", () => {
    expect(parseMeminfo("MemFree: 100 kB\n")).toBeNull();
  });
});

describe("formatMemory", () => {
  it("prints used/total in Go", () => {
    expect(formatMemory({ total: 8 * GIB, used: 2 * GIB, percent: 25 }, false)).toBe("2.00/8.00 Go");
  });

  it("prints the reported percent as is", () => {
    expect(formatMemory({ total: 8 * GIB, used: 2 * GIB, percent: 25.0 }, true)).toBe("25.0%");
    expect(formatMemory({ total: 8 * GIB, used: 2 * GIB, percent: 41.7 }, true)).toBe("41.7%");
  });
});

describe("MemoryCollector", () => {
  it("follows the percentage option", () => {
    const collector = new MemoryCollector(meminfoPath);
    expect(collector.collect(new CollectContext())).toBe("2.00/8.00 Go");
    expect(collector.collect(new CollectContext({ ramPercent: true }))).toBe("25.0%");
  });

  it("falls back to the runtime totals", () => {
    const usage = new MemoryCollector(join(dir, "absent")).usage();
    expect(usage.total).toBeGreaterThan(0);
    expect(usage.used).toBeLessThanOrEqual(usage.total);
  });
});
