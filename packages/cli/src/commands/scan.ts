import {
  loadConfig,
  meetsThreshold,
  resolveRuntimeConfig,
  scanTargets,
  writeReports,
  type ProbeBackends,
  type RawConfig,
  type ReportFormat,
  type Severity,
} from "@reconnoiter/engine";
import { formatSummary } from "../formatter.js";

export interface ScanOptions {
  target?: string;
  config?: string;
  outDir?: string;
  format?: ReportFormat;
  timeout?: number;
  nmapArgs?: string;
  noNmap: boolean;
  failOn?: Severity;
  concurrency?: number;
  signal?: AbortSignal;
  /** Defaults to the Node-backed probes. */
  backends?: ProbeBackends;
  now?: () => Date;
  out?: (text: string) => void;
  noColor?: boolean;
}

/**
 * Scan every resolved target, print a summary per target and write the
 * reports. Returns the process exit code.
 */
export async function runScan(options: ScanOptions): Promise<number> {
  const out = options.out ?? ((text: string) => process.stdout.write(text));
  const noColor = options.noColor ?? !process.stdout.isTTY;

  const raw: RawConfig = options.config ? loadConfig(options.config) : {};
  const runtime = resolveRuntimeConfig(options.target, raw, {
    outDir: options.outDir,
    format: options.format,
    timeout: options.timeout,
    nmapArgs: options.nmapArgs,
    noNmap: options.noNmap,
  });

  const now = options.now ?? (() => new Date());
  const reports = await scanTargets(runtime.targets, runtime.settings, {
    concurrency: options.concurrency,
    signal: options.signal,
    backends: options.backends,
    now,
  });

  for (const report of reports) {
    out(formatSummary(report, { noColor }) + "\n");
    const written = await writeReports(report, {
      outDir: runtime.outDir,
      format: runtime.format,
      now: now(),
    });
    for (const path of written) {
      out(`Saved: ${path}\n`);
    }
  }

  if (options.failOn) {
    const findings = reports.flatMap((r) => r.findings);
    if (meetsThreshold(findings, options.failOn)) {
      out(`\nFindings at or above ${options.failOn} severity found.\n`);
      return 1;
    }
  }
  return 0;
}
