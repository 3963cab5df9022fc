/**
 * Writes a scan report to disk in the requested formats.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ReportFormat } from "../schemas.js";
import type { ScanReport } from "../types.js";
import { renderHtmlReport } from "./html-report.js";
import { renderJsonReport, reportBaseName } from "./json-report.js";

export interface WriteReportsOptions {
  outDir: string;
  format: ReportFormat;
  /** Used for the file name timestamp. */
  now?: Date;
}

/** Returns the written paths, JSON first. Creates `outDir` if needed. */
export async function writeReports(
  report: ScanReport,
  options: WriteReportsOptions,
): Promise<string[]> {
  const baseName = reportBaseName(report.target, options.now ?? new Date());
  await mkdir(options.outDir, { recursive: true });

  const written: string[] = [];
  if (options.format === "json" || options.format === "both") {
    const path = join(options.outDir, `${baseName}.json`);
    await writeFile(path, renderJsonReport(report), "utf-8");
    written.push(path);
  }
  if (options.format === "html" || options.format === "both") {
    const path = join(options.outDir, `${baseName}.html`);
    await writeFile(path, renderHtmlReport(report), "utf-8");
    written.push(path);
  }
  return written;
}
