/**
 * JSON report — the whole annotated report, two-space indented.
 */

import type { ScanReport } from "../types.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `<target with "/" replaced by "_">_<YYYYMMDD_HHMMSS>` in local time. */
export function reportBaseName(target: string, date: Date): string {
  const safe = target.replaceAll("/", "_");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${safe}_${day}_${time}`;
}

export function renderJsonReport(report: ScanReport): string {
  return JSON.stringify(report, null, 2) + "\n";
}
