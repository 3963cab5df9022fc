/**
 * Finding engine.
 *
 * Walks a probe report in a fixed order (services, then HTTP headers per
 * scheme, then the TLS certificate) and emits severity-tagged findings.
 * `annotateReport` returns a new report; the probe report passed in is
 * left untouched.
 */

import type { Finding } from "./schemas.js";
import {
  HTTP_SCHEMES,
  SECURITY_HEADERS,
  type HttpProbeOutcome,
  type ProbeReport,
  type ScanReport,
  type ServiceEntry,
  type TlsResult,
} from "./types.js";
import {
  severityForMissingHeader,
  severityForPort,
  severityForTlsWindow,
} from "./rules/severity.js";
import { summarizeSeverity } from "./scoring.js";

/**
 * An empty header map means the headers were never probed; only a probe
 * that got a response can be missing headers.
 */
function missingHeaders(outcome: HttpProbeOutcome): string[] {
  if (!outcome.ok) return [];
  const headers = outcome.securityHeaders;
  if (Object.keys(headers).length === 0) return [];
  return SECURITY_HEADERS.filter((name) => headers[name] === undefined || headers[name] === null);
}

function annotateServices(services: ServiceEntry[]): ServiceEntry[] {
  return services.map((svc) => {
    const { severity, reason } = severityForPort(svc.port);
    return { ...svc, severity, severityReason: reason };
  });
}

function annotateTls(tls: TlsResult, now: Date): TlsResult {
  if (!tls.ok) return tls;
  const { severity, reason } = severityForTlsWindow(tls.notAfter, now);
  return { ...tls, severity, severityReason: reason };
}

/**
 * Build findings for a report. Pure: the same report and clock always
 * yield the same list.
 */
export function buildFindings(report: ProbeReport, now: Date = new Date()): Finding[] {
  const findings: Finding[] = [];

  for (const svc of report.nmap.services) {
    const { severity, reason } = severityForPort(svc.port);
    findings.push({
      category: "open_port",
      target: svc.port,
      severity,
      title: `Open port ${svc.port}`,
      details: reason,
      service: svc.service,
    });
  }

  for (const scheme of HTTP_SCHEMES) {
    for (const header of missingHeaders(report.http[scheme])) {
      findings.push({
        category: "missing_security_header",
        target: scheme,
        severity: severityForMissingHeader(header),
        title: `Missing header: ${header}`,
        details: `${scheme.toUpperCase()} response is missing ${header}`,
      });
    }
  }

  if (report.tls.ok) {
    const { severity, reason } = severityForTlsWindow(report.tls.notAfter, now);
    findings.push({
      category: "tls_certificate",
      target: report.target,
      severity,
      title: "TLS certificate health",
      details: reason,
    });
  }

  return findings;
}

/**
 * Derive findings and write severities onto a copy of the report's
 * services and TLS result. No section of the result is shared with the
 * probe report. Passing an already-annotated report rebuilds
 * the same findings and annotations rather than appending.
 */
export function annotateReport(report: ProbeReport, now: Date = new Date()): ScanReport {
  const findings = buildFindings(report, now);
  return {
    target: report.target,
    scannedAt: report.scannedAt,
    settings: { ...report.settings },
    dns: structuredClone(report.dns),
    nmap: { ...report.nmap, services: annotateServices(report.nmap.services) },
    http: structuredClone(report.http),
    tls: annotateTls(structuredClone(report.tls), now),
    findings,
    severitySummary: summarizeSeverity(findings),
  };
}
