import { describe, it, expect } from "vitest";
import { exec } from "./shell.js";

describe("exec", () => {
  it("reports a program that cannot be launched", () => {
    expect(exec("peakfetch-no-such-program")).toEqual({ stdout: "", success: false });
  });
});
