import { describe, it, expect, vi, afterEach } from "vitest";
import { exec } from "../utils/shell.js";
import { GpuCollector, parseDisplayController } from "./gpu.js";

vi.mock("../utils/shell.js", () => ({
  exec: vi.fn(),
}));

const LSPCI = [
  "00:00.0 Host bridge: Intel Corporation 8th Gen Core Processor Host Bridge/DRAM Registers (rev 07)",
  "00:02.0 VGA compatible controller: Intel Corporation UHD Graphics 630 (Desktop)",
  "01:00.0 3D controller: NVIDIA Corporation TU117M [GeForce GTX 1650 Mobile / Max-Q] (rev a1)",
].join("\n");

afterEach(() => {
  vi.mocked(exec).mockReset();
});

describe("parseDisplayController", () => {
  it("takes the first display controller", () => {
    expect(parseDisplayController(LSPCI)).toBe("Intel Corporation UHD Graphics 630 (Desktop)");
  });

  it("matches 3D controllers", () => {
    expect(parseDisplayController(LSPCI.split("\n").filter((l) => !l.includes("VGA")).join("\n"))).toBe(
      "NVIDIA Corporation TU117M [GeForce GTX 1650 Mobile / Max-Q] (rev a1)",
    );
  });

  it("returns null without a display controller", () => {
    expect(parseDisplayController("00:1f.3 Audio device: Intel Corporation Cannon Lake PCH cAVS")).toBeNull();
  });
});

describe("GpuCollector", () => {
  it("reports the device name", () => {
    vi.mocked(exec).mockReturnValue({ stdout: LSPCI, success: true });
    expect(new GpuCollector().collect()).toEqual({
      value: "Intel Corporation UHD Graphics 630 (Desktop)",
      present: true,
    });
    expect(exec).toHaveBeenCalledWith("lspci");
  });

  it("shows N/A when lspci runs but finds nothing", () => {
    vi.mocked(exec).mockReturnValue({ stdout: "00:00.0 Host bridge: Foo", success: true });
    expect(new GpuCollector().collect()).toEqual({ value: "N/A", present: true });
  });

  it("hides the line when lspci fails", () => {
    vi.mocked(exec).mockReturnValue({ stdout: "", success: false });
    expect(new GpuCollector().collect()).toEqual({ value: "N/A", present: false });
  });
});
