/**
 * Report types.
 *
 * A `ProbeReport` is what the coordinator produces from the four probes;
 * `annotateReport` turns it into a `ScanReport` with findings attached.
 */

import type { Finding, ScanSettings, Severity, SeveritySummary } from "./schemas.js";

export const DNS_RECORD_TYPES = ["A", "AAAA", "CNAME", "NS", "MX", "TXT"] as const;
export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

/** Canonical order; finding traversal follows it. */
export const SECURITY_HEADERS = [
  "strict-transport-security",
  "content-security-policy",
  "x-frame-options",
  "x-content-type-options",
  "referrer-policy",
  "permissions-policy",
] as const;
export type SecurityHeaderName = (typeof SECURITY_HEADERS)[number];

export const HTTP_SCHEMES = ["http", "https"] as const;
export type HttpScheme = (typeof HTTP_SCHEMES)[number];

// ---------------------------------------------------------------------------
// Probe results
// ---------------------------------------------------------------------------

export interface DnsResult {
  target: string;
  resolvedIp: string | null;
  /** Empty for IP targets and when the probe is disabled. */
  records: Partial<Record<DnsRecordType, string[]>>;
  errors: string[];
}

export interface ServiceEntry {
  /** e.g. "22/tcp" */
  port: string;
  state: string;
  service: string;
  version: string;
  severity?: Severity;
  severityReason?: string;
}

export interface PortScanResult {
  /** Whether the scanner binary was found and run. */
  available: boolean;
  skipped: boolean;
  error: string | null;
  command: string | null;
  services: ServiceEntry[];
  stdout: string;
  stderr: string;
}

export type SecurityHeaders = Partial<Record<SecurityHeaderName, string | null>>;

export interface HttpProbeOutcome {
  url: string;
  ok: boolean;
  statusCode: number | null;
  server: string | null;
  securityHeaders: SecurityHeaders;
  error: string | null;
}

export type HttpResult = Record<HttpScheme, HttpProbeOutcome>;

/** Certificate name attributes, e.g. `{ CN: "example.com", O: "Example" }`. */
export type DistinguishedName = Record<string, string | string[]>;

export interface TlsCipher {
  name: string;
  standardName: string;
  version: string;
}

export interface TlsSuccess {
  ok: true;
  subject: DistinguishedName;
  issuer: DistinguishedName;
  san: string[];
  /** ISO-8601 UTC, or the certificate's raw string when it could not be parsed. */
  notBefore: string | null;
  notAfter: string | null;
  protocol: string | null;
  cipher: TlsCipher | null;
  severity?: Severity;
  severityReason?: string;
}

export interface TlsFailure {
  ok: false;
  error: string;
}

export type TlsResult = TlsSuccess | TlsFailure;

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export interface ProbeReport {
  target: string;
  scannedAt: string;
  settings: ScanSettings;
  dns: DnsResult;
  nmap: PortScanResult;
  http: HttpResult;
  tls: TlsResult;
}

export interface ScanReport extends ProbeReport {
  findings: Finding[];
  severitySummary: SeveritySummary;
}
