import { readTextFile } from "../utils/files.js";
import { getPlatformInfo } from "../utils/platform.js";
import { BaseCollector } from "./base.js";

export const OS_RELEASE_PATH = "/etc/os-release";

/** Value of PRETTY_NAME in an os-release document, unquoted. */
export function parsePrettyName(osRelease: string): string | null {
  for (const line of osRelease.split("\n")) {
    if (!line.startsWith("PRETTY_NAME=")) continue;
    const value = line.slice("PRETTY_NAME=".length).trim();
    return value.replace(/^["']|["']$/g, "");
  }
  return null;
}

export class OsNameCollector extends BaseCollector {
  readonly field = "os" as const;

  constructor(private readonly osReleasePath = OS_RELEASE_PATH) {
    super();
  }

  collect(): string {
    const content = readTextFile(this.osReleasePath);
    const prettyName = content === null ? null : parsePrettyName(content);
    return prettyName || getPlatformInfo().family;
  }
}

export class KernelCollector extends BaseCollector {
  readonly field = "kernel" as const;

  collect(): string {
    return getPlatformInfo().kernel;
  }
}

export class HostnameCollector extends BaseCollector {
  readonly field = "hostname" as const;

  collect(): string {
    return getPlatformInfo().hostname;
  }
}
