import type { Finding, PolicyRule, ScanReport, Severity } from "@reconnoiter/engine";

// ANSI escape codes — no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

/** Findings listed in the console summary; the rest are in the reports. */
export const SUMMARY_FINDING_LIMIT = 12;

export interface FormatOptions {
  noColor?: boolean;
}

function painter(options: FormatOptions): (color: string, text: string) => string {
  return options.noColor ? (_color, text) => text : (color, text) => `${color}${text}${RESET}`;
}

function severityColor(severity: Severity): string {
  switch (severity) {
    case "high": return BOLD + RED;
    case "medium": return BOLD + YELLOW;
    case "low": return BOLD + CYAN;
  }
}

function sectionLines(report: ScanReport): [string, string][] {
  const { dns, nmap, http, tls } = report;
  return [
    ["DNS", `resolved_ip=${dns.resolvedIp ?? "n/a"} errors=${dns.errors.length}`],
    [
      "Nmap",
      nmap.available ? `open_ports=${nmap.services.length}` : `unavailable (${nmap.error ?? "unknown"})`,
    ],
    [
      "HTTP(S)",
      `http=${http.http.statusCode ?? "None"} https=${http.https.statusCode ?? "None"}`,
    ],
    ["TLS", tls.ok ? "ok" : tls.error],
  ];
}

function findingLine(finding: Finding, paint: (color: string, text: string) => string): string {
  const label = paint(severityColor(finding.severity), finding.severity.toUpperCase().padEnd(6));
  return `  ${label}  ${finding.title}  ${paint(DIM, finding.details)}`;
}

/**
 * Console summary for one target: probe sections, the first findings and
 * the severity counts.
 */
export function formatSummary(report: ScanReport, options: FormatOptions = {}): string {
  const paint = painter(options);
  const lines: string[] = [];

  lines.push("");
  lines.push(paint(BOLD, `Recon Summary: ${report.target}`));
  for (const [section, details] of sectionLines(report)) {
    lines.push(`  ${paint(RED, section.padEnd(8))}  ${details}`);
  }

  lines.push("");
  lines.push(paint(BOLD, "Findings by Severity"));
  if (report.findings.length === 0) {
    lines.push(`  ${paint(CYAN, "LOW   ")}  No notable findings  ${paint(DIM, "No findings were generated")}`);
  } else {
    for (const finding of report.findings.slice(0, SUMMARY_FINDING_LIMIT)) {
      lines.push(findingLine(finding, paint));
    }
    const hidden = report.findings.length - SUMMARY_FINDING_LIMIT;
    if (hidden > 0) lines.push(paint(DIM, `  ... and ${hidden} more (see report)`));
  }

  const { high, medium, low } = report.severitySummary;
  const border = high > 0 ? RED : medium > 0 ? YELLOW : GREEN;
  lines.push("");
  lines.push(paint(border, "Scan complete"));
  lines.push(
    `  ${paint(RED, "High:")} ${high}  ${paint(YELLOW, "Medium:")} ${medium}  ${paint(CYAN, "Low:")} ${low}`,
  );
  lines.push(`  Total findings: ${report.findings.length}`);
  lines.push("");

  return lines.join("\n");
}

/** Port and header severity tables for the `policy` command. */
export function formatPolicy(rules: PolicyRule[], options: FormatOptions = {}): string {
  const paint = painter(options);
  const lines: string[] = [""];

  for (const kind of ["port", "header"] as const) {
    const rows = rules.filter((r) => r.kind === kind);
    if (rows.length === 0) continue;
    lines.push(paint(BOLD, kind === "port" ? "Open ports" : "Missing security headers"));
    const width = Math.max(...rows.map((r) => r.match.length));
    for (const rule of rows) {
      const label = paint(severityColor(rule.severity), rule.severity.toUpperCase().padEnd(6));
      lines.push(`  ${rule.match.padEnd(width)}  ${label}  ${rule.reason}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
