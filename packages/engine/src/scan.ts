/**
 * Scan pipeline — validate settings, coordinate probes, derive findings.
 */

import { ScanSettingsSchema, type ScanSettings } from "./schemas.js";
import type { ScanReport } from "./types.js";
import type { ProbeBackends } from "./probes/types.js";
import { coordinateProbes } from "./coordinator.js";
import { annotateReport } from "./findings.js";
import { nodeDnsBackend } from "./probes/dns.js";
import { nmapBackend } from "./probes/nmap.js";
import { fetchHttpBackend } from "./probes/http.js";
import { nodeTlsBackend } from "./probes/tls.js";
import { logger } from "./logger.js";

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scan settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

/** Validate settings before any probe starts. Throws SettingsError. */
export function validateSettings(input: unknown): ScanSettings {
  const result = ScanSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}

export function createDefaultBackends(): ProbeBackends {
  return {
    dns: nodeDnsBackend,
    portScanner: nmapBackend,
    http: fetchHttpBackend,
    tls: nodeTlsBackend,
  };
}

export interface ScanOptions {
  backends?: ProbeBackends;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface ScanManyOptions extends ScanOptions {
  /** Targets scanned at once. Default 4. */
  concurrency?: number;
  /** Called as each target finishes, in completion order. */
  onReport?: (report: ScanReport) => void;
}

/**
 * Scan a single target. Probe failures end up inside the report; only
 * invalid settings or an empty target throw.
 */
export async function scanTarget(
  target: string,
  settings: ScanSettings,
  options: ScanOptions = {},
): Promise<ScanReport> {
  const validated = validateSettings(settings);
  const trimmed = target.trim();
  if (!trimmed) throw new SettingsError(["target: must not be empty"]);

  const now = options.now ?? (() => new Date());
  const startTime = Date.now();
  const probeReport = await coordinateProbes(trimmed, validated, {
    backends: options.backends ?? createDefaultBackends(),
    signal: options.signal,
    now,
  });
  const report = annotateReport(probeReport, now());
  logger.info(
    `[scan] ${trimmed}: ${report.findings.length} findings in ${Date.now() - startTime}ms`,
  );
  return report;
}

/**
 * Scan several targets with bounded concurrency. Reports come back in
 * input order.
 */
export async function scanTargets(
  targets: string[],
  settings: ScanSettings,
  options: ScanManyOptions = {},
): Promise<ScanReport[]> {
  const validated = validateSettings(settings);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  const reports = new Array<ScanReport | undefined>(targets.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < targets.length) {
      const index = next++;
      const report = await scanTarget(targets[index] ?? "", validated, options);
      reports[index] = report;
      options.onReport?.(report);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, targets.length) }, () => worker());
  await Promise.all(workers);

  return reports.filter((r): r is ScanReport => r !== undefined);
}
