import { execFileSync } from "node:child_process";

export interface ShellResult {
  stdout: string;
  success: boolean;
}

/**
 * Runs a program with no arguments and no shell, and waits for it to exit.
 * Never throws: launch failures, non-zero exits and timeouts all come back
 * with `success: false`.
 */
export function exec(file: string, timeoutMs = 10_000): ShellResult {
  try {
    const stdout = execFileSync(file, {
      timeout: timeoutMs,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout: stdout.trim(), success: true };
  } catch {
    return { stdout: "", success: false };
  }
}
