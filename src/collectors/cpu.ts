import { cpus } from "node:os";
import { UNKNOWN } from "../core/models.js";
import { readTextFile } from "../utils/files.js";
import { BaseCollector } from "./base.js";

export const CPUINFO_PATH = "/proc/cpuinfo";

export function parseModelName(cpuinfo: string): string | null {
  for (const line of cpuinfo.split("\n")) {
    if (!line.startsWith("model name")) continue;
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    return line.slice(colon + 1).trim();
  }
  return null;
}

export class CpuCollector extends BaseCollector {
  readonly field = "cpu" as const;

  constructor(private readonly cpuinfoPath = CPUINFO_PATH) {
    super();
  }

  collect(): string {
    const content = readTextFile(this.cpuinfoPath);
    if (content !== null) {
      return parseModelName(content) ?? UNKNOWN;
    }
    // No procfs (macOS, BSD): ask the runtime instead.
    const model = cpus()[0]?.model.trim();
    return model || UNKNOWN;
  }
}
