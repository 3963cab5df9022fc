// ---------------------------------------------------------------------------
// @reconnoiter/engine
//
// Recon scanner core: probes, coordinator, severity rules and findings.
// Shared by the CLI.
// ---------------------------------------------------------------------------

// Schemas and result types
export {
  SeveritySchema,
  FindingCategorySchema,
  FindingSchema,
  SeveritySummarySchema,
  ScanSettingsSchema,
  ReportFormatSchema,
  type Severity,
  type FindingCategory,
  type Finding,
  type SeveritySummary,
  type ScanSettings,
  type ReportFormat,
} from "./schemas.js";

export {
  DNS_RECORD_TYPES,
  SECURITY_HEADERS,
  HTTP_SCHEMES,
  type DnsRecordType,
  type SecurityHeaderName,
  type HttpScheme,
  type DnsResult,
  type ServiceEntry,
  type PortScanResult,
  type SecurityHeaders,
  type HttpProbeOutcome,
  type HttpResult,
  type DistinguishedName,
  type TlsCipher,
  type TlsSuccess,
  type TlsFailure,
  type TlsResult,
  type ProbeReport,
  type ScanReport,
} from "./types.js";

// Probes
export type {
  BackendCallOptions,
  DnsBackend,
  ProcessOutcome,
  PortScanBackend,
  HttpResponseInfo,
  HttpBackend,
  PeerCertificateInfo,
  TlsBackend,
  ProbeBackends,
} from "./probes/types.js";
export { withDeadline, ProbeTimeoutError, ProbeAbortedError } from "./probes/deadline.js";
export { resolveDns, isIpTarget, nodeDnsBackend } from "./probes/dns.js";
export {
  runPortScan,
  parseNmapOutput,
  splitArgs,
  createNmapBackend,
  nmapBackend,
  DEFAULT_NMAP_ARGS,
} from "./probes/nmap.js";
export {
  probeUrl,
  rootUrl,
  normalizeHeaders,
  pickSecurityHeaders,
  fetchHttpBackend,
  USER_AGENT,
} from "./probes/http.js";
export { probeTls, parseCertTime, parseSubjectAltNames, nodeTlsBackend } from "./probes/tls.js";

// Coordinator
export {
  coordinateProbes,
  effectivePortScanTimeout,
  DNS_DISABLED,
  PORT_SCAN_DISABLED,
  HTTP_DISABLED,
  TLS_DISABLED,
  TLS_HTTPS_UNREACHABLE,
  type CoordinateOptions,
} from "./coordinator.js";

// Severity rules
export {
  severityForPort,
  severityForMissingHeader,
  severityForTlsWindow,
  HIGH_RISK_PORTS,
  MEDIUM_RISK_PORTS,
  type SeverityVerdict,
} from "./rules/severity.js";
export { getPolicy, getPortPolicy, getHeaderPolicy, type PolicyRule } from "./rules/registry.js";

// Findings
export { buildFindings, annotateReport } from "./findings.js";
export { summarizeSeverity, meetsThreshold, isSeverity, SEVERITY_ORDER } from "./scoring.js";

// Scan pipeline
export {
  scanTarget,
  scanTargets,
  validateSettings,
  createDefaultBackends,
  SettingsError,
  type ScanOptions,
  type ScanManyOptions,
} from "./scan.js";

// Config
export {
  loadConfig,
  resolveRuntimeConfig,
  ConfigError,
  DEFAULT_TIMEOUT,
  DEFAULT_OUT_DIR,
  DEFAULT_FORMAT,
  type RawConfig,
  type CliOverrides,
  type RuntimeConfig,
} from "./config.js";

// Formatters
export { renderJsonReport, reportBaseName } from "./formatters/json-report.js";
export { renderHtmlReport, escapeHtml } from "./formatters/html-report.js";
export { writeReports, type WriteReportsOptions } from "./formatters/writer.js";

// Logger
export { logger, parseLevel } from "./logger.js";
