import type { ExportDocument, SystemSnapshot } from "../core/models.js";

/** The GPU value is exported even when its display line is suppressed. */
export function toExportDocument(snapshot: SystemSnapshot): ExportDocument {
  return {
    OS: snapshot.osName,
    Kernel: snapshot.kernel,
    Hostname: snapshot.hostname,
    Uptime: snapshot.uptime,
    CPU: snapshot.cpuName,
    RAM: snapshot.ramInfo,
    GPU: snapshot.gpu.value,
    Disk: snapshot.diskInfo,
    Temp: snapshot.temperature,
  };
}

export function renderJSON(snapshot: SystemSnapshot): string {
  return JSON.stringify(toExportDocument(snapshot), null, 2);
}
