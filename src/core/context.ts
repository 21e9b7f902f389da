import type { CollectOptions } from "./models.js";

export class CollectContext {
  readonly ramPercent: boolean;
  readonly includeDisk: boolean;
  readonly includeTemp: boolean;

  constructor(opts: CollectOptions = {}) {
    this.ramPercent = opts.ramPercent ?? false;
    this.includeDisk = opts.includeDisk ?? false;
    this.includeTemp = opts.includeTemp ?? false;
  }
}
