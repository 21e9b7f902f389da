import chalk from "chalk";
import type { SystemSnapshot } from "../core/models.js";
import { BANNER, BANNER_WIDTH } from "./banner.js";

export interface BannerRow {
  art: string | null;
  text: string | null;
}

/**
 * Display lines in report order. The GPU line is only emitted when the
 * lookup could run; two blank lines close the block.
 */
export function buildReportLines(snapshot: SystemSnapshot): string[] {
  const lines = [
    `OS: ${snapshot.osName}`,
    `Kernel: ${snapshot.kernel}`,
    `Hostname: ${snapshot.hostname}`,
    `Uptime: ${snapshot.uptime}`,
    `RAM: ${snapshot.ramInfo}`,
    `CPU: ${snapshot.cpuName}`,
  ];
  if (snapshot.gpu.present) {
    lines.push(`GPU: ${snapshot.gpu.value}`);
  }
  lines.push(`Disk: ${snapshot.diskInfo}`, `Temp: ${snapshot.temperature}`, "", "");
  return lines;
}

/** Pairs art line i with text line i; either side may run out first. */
export function pairWithBanner(lines: readonly string[], art: readonly string[] = BANNER): BannerRow[] {
  const rows: BannerRow[] = [];
  const count = Math.max(lines.length, art.length);
  for (let i = 0; i < count; i++) {
    rows.push({
      art: i < art.length ? art[i] : null,
      text: i < lines.length ? lines[i] : null,
    });
  }
  return rows;
}

function formatRow(row: BannerRow): string {
  const text = row.text ? row.text.replace(/^[^:]+:/, (label) => chalk.bold(label)) : "";
  if (!text) {
    return row.art ? chalk.cyan(row.art.trimEnd()) : "";
  }
  const cell = (row.art ?? "").padEnd(BANNER_WIDTH);
  return row.art ? chalk.cyan(cell) + text : cell + text;
}

export function renderTerminal(snapshot: SystemSnapshot): string {
  const rows = pairWithBanner(buildReportLines(snapshot)).map(formatRow);
  return ["", ...rows, ""].join("\n");
}
