/**
 * Probe coordinator.
 *
 * Runs DNS, the port scan and both HTTP schemes in parallel, then TLS once
 * the HTTPS outcome is known. Every probe runs under a hard deadline;
 * a probe that times out, is cancelled or throws is replaced by a failed
 * placeholder of its own kind, so the coordinator always returns a
 * complete report and never throws.
 */

import type { ScanSettings } from "./schemas.js";
import type {
  DnsResult,
  HttpProbeOutcome,
  HttpScheme,
  PortScanResult,
  ProbeReport,
  TlsResult,
} from "./types.js";
import type { ProbeBackends } from "./probes/types.js";
import { withDeadline } from "./probes/deadline.js";
import { resolveDns } from "./probes/dns.js";
import { runPortScan } from "./probes/nmap.js";
import { emptySecurityHeaders, probeUrl, rootUrl } from "./probes/http.js";
import { probeTls } from "./probes/tls.js";
import { logger } from "./logger.js";

/** Added to each probe's own timeout so backend-level timeouts report first. */
const GRACE_MS = 1_000;

export const DNS_DISABLED = "DNS probe disabled by configuration.";
export const PORT_SCAN_DISABLED = "Port scan disabled by configuration.";
export const HTTP_DISABLED = "HTTP probe disabled by configuration.";
export const TLS_DISABLED = "TLS probe disabled by configuration.";
export const TLS_HTTPS_UNREACHABLE = "HTTPS probe failed; TLS details unavailable.";

export interface CoordinateOptions {
  backends: ProbeBackends;
  /** Aborting cancels outstanding probes; they are reported as failed. */
  signal?: AbortSignal;
  now?: () => Date;
}

/** Port scans take much longer than single connects. Seconds. */
export function effectivePortScanTimeout(timeout: number): number {
  return Math.max(timeout * 4, 20);
}

// ---------------------------------------------------------------------------
// Placeholders
// ---------------------------------------------------------------------------

function failedDns(target: string, error: string): DnsResult {
  return { target, resolvedIp: null, records: {}, errors: [error] };
}

/** Only a disabled scan is reported unavailable; a failed one was attempted. */
function failedPortScan(error: string, disabled = false): PortScanResult {
  return {
    available: !disabled,
    skipped: disabled,
    error,
    command: null,
    services: [],
    stdout: "",
    stderr: "",
  };
}

function failedHttp(url: string, error: string): HttpProbeOutcome {
  return {
    url,
    ok: false,
    statusCode: null,
    server: null,
    securityHeaders: emptySecurityHeaders(),
    error,
  };
}

function failedTls(error: string): TlsResult {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Isolation
// ---------------------------------------------------------------------------

async function guard<T>(
  name: string,
  deadlineMs: number,
  signal: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
  fallback: (error: string) => T,
): Promise<T> {
  const startTime = Date.now();
  try {
    logger.debug(`[probe] Running ${name}...`);
    const result = await withDeadline(name, deadlineMs, signal, task);
    logger.info(`[probe] ${name} completed in ${Date.now() - startTime}ms`);
    return result;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`[probe] ${name} failed: ${message}`);
    return fallback(message);
  }
}

// ---------------------------------------------------------------------------
// Probes
// ---------------------------------------------------------------------------

function runDns(target: string, settings: ScanSettings, options: CoordinateOptions): Promise<DnsResult> {
  if (!settings.dns) return Promise.resolve(failedDns(target, DNS_DISABLED));

  return guard(
    "dns",
    settings.timeout * 1000 + GRACE_MS,
    options.signal,
    (signal) => resolveDns(target, options.backends.dns, { timeout: settings.timeout, signal }),
    (error) => failedDns(target, error),
  );
}

function runNmap(target: string, settings: ScanSettings, options: CoordinateOptions): Promise<PortScanResult> {
  if (!settings.nmap) return Promise.resolve(failedPortScan(PORT_SCAN_DISABLED, true));

  const timeout = effectivePortScanTimeout(settings.timeout);
  return guard(
    "nmap",
    timeout * 1000 + GRACE_MS,
    options.signal,
    (signal) =>
      runPortScan(target, options.backends.portScanner, {
        timeout,
        nmapArgs: settings.nmapArgs,
        signal,
      }),
    (error) => failedPortScan(error),
  );
}

function runHttpScheme(
  scheme: HttpScheme,
  target: string,
  settings: ScanSettings,
  options: CoordinateOptions,
): Promise<HttpProbeOutcome> {
  const url = rootUrl(scheme, target);
  if (!settings.http) return Promise.resolve(failedHttp(url, HTTP_DISABLED));

  return guard(
    scheme,
    settings.httpTimeout * 1000 + GRACE_MS,
    options.signal,
    (signal) => probeUrl(url, options.backends.http, { timeout: settings.httpTimeout, signal }),
    (error) => failedHttp(url, error),
  );
}

function runTls(
  target: string,
  settings: ScanSettings,
  https: HttpProbeOutcome,
  options: CoordinateOptions,
): Promise<TlsResult> {
  if (!settings.tls) return Promise.resolve(failedTls(TLS_DISABLED));
  if (!https.ok) {
    logger.info("[probe] tls skipped (HTTPS not reachable)");
    return Promise.resolve(failedTls(TLS_HTTPS_UNREACHABLE));
  }

  return guard(
    "tls",
    settings.tlsTimeout * 1000 + GRACE_MS,
    options.signal,
    (signal) =>
      probeTls(target, options.backends.tls, { timeout: settings.tlsTimeout, port: 443, signal }),
    (error) => failedTls(error),
  );
}

/**
 * Run every enabled probe against one target and assemble the probe report.
 */
export async function coordinateProbes(
  target: string,
  settings: ScanSettings,
  options: CoordinateOptions,
): Promise<ProbeReport> {
  const now = options.now ?? (() => new Date());
  const scannedAt = now().toISOString();

  const [dns, nmap, http, https] = await Promise.all([
    runDns(target, settings, options),
    runNmap(target, settings, options),
    runHttpScheme("http", target, settings, options),
    runHttpScheme("https", target, settings, options),
  ]);

  const tls = await runTls(target, settings, https, options);

  return {
    target,
    scannedAt,
    settings: { ...settings },
    dns,
    nmap,
    http: { http, https },
    tls,
  };
}
