import * as os from "node:os";

export interface PlatformInfo {
  /** OS family as the runtime reports it, e.g. "Linux" or "Darwin". */
  family: string;
  kernel: string;
  hostname: string;
}

export function getPlatformInfo(): PlatformInfo {
  return {
    family: os.type(),
    kernel: os.release(),
    hostname: os.hostname(),
  };
}
