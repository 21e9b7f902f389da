import { NOT_AVAILABLE, type Detected } from "../core/models.js";
import { exec } from "../utils/shell.js";
import { BaseCollector } from "./base.js";

const DISPLAY_CONTROLLERS = ["VGA compatible controller", "3D controller"];

/**
 * Device name from the first display controller in `lspci` output, e.g.
 * "01:00.0 VGA compatible controller: NVIDIA Corporation GA104 (rev a1)"
 * gives "NVIDIA Corporation GA104 (rev a1)".
 */
export function parseDisplayController(lspciOutput: string): string | null {
  for (const line of lspciOutput.split("\n")) {
    if (!DISPLAY_CONTROLLERS.some((kind) => line.includes(kind))) continue;
    return (line.split(":")[2] ?? "").trim();
  }
  return null;
}

export class GpuCollector extends BaseCollector<Detected<string>> {
  readonly field = "gpu" as const;

  constructor(private readonly command = "lspci") {
    super();
  }

  collect(): Detected<string> {
    const result = exec(this.command);
    if (!result.success) {
      return { value: NOT_AVAILABLE, present: false };
    }
    return {
      value: parseDisplayController(result.stdout) ?? NOT_AVAILABLE,
      present: true,
    };
  }
}
