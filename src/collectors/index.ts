import { CpuCollector } from "./cpu.js";
import { DiskCollector } from "./disk.js";
import { GpuCollector } from "./gpu.js";
import { HostnameCollector, KernelCollector, OsNameCollector } from "./identity.js";
import { MemoryCollector } from "./memory.js";
import { TemperatureCollector } from "./temperature.js";
import { UptimeCollector } from "./uptime.js";

export interface CollectorSet {
  os: OsNameCollector;
  kernel: KernelCollector;
  hostname: HostnameCollector;
  uptime: UptimeCollector;
  ram: MemoryCollector;
  cpu: CpuCollector;
  gpu: GpuCollector;
  disk: DiskCollector;
  temp: TemperatureCollector;
}

export function createCollectors(overrides: Partial<CollectorSet> = {}): CollectorSet {
  return {
    os: new OsNameCollector(),
    kernel: new KernelCollector(),
    hostname: new HostnameCollector(),
    uptime: new UptimeCollector(),
    ram: new MemoryCollector(),
    cpu: new CpuCollector(),
    gpu: new GpuCollector(),
    disk: new DiskCollector(),
    temp: new TemperatureCollector(),
    ...overrides,
  };
}

export { BaseCollector } from "./base.js";
