import type { SystemSnapshot } from "./models.js";
import { CollectContext } from "./context.js";
import { PeakfetchError } from "./errors.js";
import { createCollectors, type BaseCollector, type CollectorSet } from "../collectors/index.js";

/**
 * Reads every field once, in order, and freezes the result. Fallbacks live in
 * the individual collectors; anything they let escape aborts the run.
 */
export class SystemInfoCollector {
  private readonly collectors: CollectorSet;

  constructor(overrides: Partial<CollectorSet> = {}) {
    this.collectors = createCollectors(overrides);
  }

  collect(ctx: CollectContext = new CollectContext()): SystemSnapshot {
    const c = this.collectors;

    const osName = run(c.os, ctx);
    const kernel = run(c.kernel, ctx);
    const hostname = run(c.hostname, ctx);

    const uptime = run(c.uptime, ctx);
    const ramInfo = run(c.ram, ctx);
    const diskInfo = run(c.disk, ctx);
    const temperature = run(c.temp, ctx);
    const cpuName = run(c.cpu, ctx);
    const gpu = Object.freeze(run(c.gpu, ctx));

    return Object.freeze({
      osName,
      kernel,
      hostname,
      uptime,
      ramInfo,
      cpuName,
      gpu,
      diskInfo,
      temperature,
    });
  }
}

function run<T>(collector: BaseCollector<T>, ctx: CollectContext): T {
  try {
    return collector.collect(ctx);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PeakfetchError(`${collector.field}: ${reason}`, { cause: err });
  }
}
