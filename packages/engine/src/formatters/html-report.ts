/**
 * HTML report generator.
 *
 * Produces a standalone page (inline styles, no external assets) with the
 * severity counts, the findings table and one section per probe. Every
 * value taken from the report is escaped.
 */

import type { Severity } from "../schemas.js";
import type { HttpProbeOutcome, ScanReport, TlsResult } from "../types.js";
import { DNS_RECORD_TYPES, HTTP_SCHEMES, SECURITY_HEADERS } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SEVERITY_LABELS: Record<Severity, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
};

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #1d1d1f; }
h1 { margin-bottom: 0.25rem; }
table { border-collapse: collapse; margin: 0.5rem 0 1.5rem; width: 100%; }
th, td { border: 1px solid #d0d0d0; padding: 0.35rem 0.6rem; text-align: left; vertical-align: top; }
th { background: #f3f3f3; }
.sev-high { color: #b00020; font-weight: 600; }
.sev-medium { color: #a15c00; font-weight: 600; }
.sev-low { color: #00639b; font-weight: 600; }
.muted { color: #6e6e73; }
`.trim();

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

function cell(value: string | number | null | undefined): string {
  if (value === null || value === undefined || value === "") {
    return `<td class="muted">n/a</td>`;
  }
  return `<td>${escapeHtml(String(value))}</td>`;
}

function row(cells: string[]): string {
  return `<tr>${cells.join("")}</tr>`;
}

function table(headers: string[], rows: string[]): string {
  const head = row(headers.map((h) => `<th>${escapeHtml(h)}</th>`));
  return [`<table>`, `<thead>${head}</thead>`, `<tbody>`, ...rows, `</tbody>`, `</table>`].join("\n");
}

function severityCell(severity: Severity | undefined): string {
  if (!severity) return `<td class="muted">n/a</td>`;
  return `<td class="sev-${severity}">${SEVERITY_LABELS[severity]}</td>`;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function renderFindings(report: ScanReport): string[] {
  const out = ["<h2>Findings</h2>"];
  if (report.findings.length === 0) {
    out.push(`<p class="muted">No findings were generated.</p>`);
    return out;
  }
  out.push(
    table(
      ["Severity", "Category", "Target", "Title", "Details"],
      report.findings.map((f) =>
        row([severityCell(f.severity), cell(f.category), cell(f.target), cell(f.title), cell(f.details)]),
      ),
    ),
  );
  return out;
}

function renderDns(report: ScanReport): string[] {
  const { dns } = report;
  const out = ["<h2>DNS</h2>", `<p>Resolved IP: ${escapeHtml(dns.resolvedIp ?? "n/a")}</p>`];
  const rows = DNS_RECORD_TYPES.filter((t) => dns.records[t] !== undefined).map((t) =>
    row([cell(t), cell((dns.records[t] ?? []).join(", "))]),
  );
  if (rows.length > 0) out.push(table(["Type", "Records"], rows));
  for (const error of dns.errors) {
    out.push(`<p class="muted">${escapeHtml(error)}</p>`);
  }
  return out;
}

function renderPorts(report: ScanReport): string[] {
  const { nmap } = report;
  const out = ["<h2>Open ports</h2>"];
  if (nmap.command) out.push(`<p><code>${escapeHtml(nmap.command)}</code></p>`);
  if (nmap.error) out.push(`<p class="muted">${escapeHtml(nmap.error)}</p>`);
  if (nmap.services.length > 0) {
    out.push(
      table(
        ["Port", "State", "Service", "Version", "Severity", "Reason"],
        nmap.services.map((s) =>
          row([
            cell(s.port),
            cell(s.state),
            cell(s.service),
            cell(s.version),
            severityCell(s.severity),
            cell(s.severityReason),
          ]),
        ),
      ),
    );
  }
  return out;
}

function renderHttpOutcome(outcome: HttpProbeOutcome): string {
  return row([
    cell(outcome.url),
    cell(outcome.statusCode),
    cell(outcome.server),
    cell(outcome.error),
  ]);
}

function renderHttp(report: ScanReport): string[] {
  const out = ["<h2>HTTP(S)</h2>"];
  out.push(
    table(
      ["URL", "Status", "Server", "Error"],
      HTTP_SCHEMES.map((scheme) => renderHttpOutcome(report.http[scheme])),
    ),
  );
  out.push(
    table(
      ["Header", ...HTTP_SCHEMES.map((s) => s.toUpperCase())],
      SECURITY_HEADERS.map((h) =>
        row([cell(h), ...HTTP_SCHEMES.map((s) => cell(report.http[s].securityHeaders[h]))]),
      ),
    ),
  );
  return out;
}

function renderTls(tls: TlsResult): string[] {
  const out = ["<h2>TLS</h2>"];
  if (!tls.ok) {
    out.push(`<p class="muted">${escapeHtml(tls.error)}</p>`);
    return out;
  }
  out.push(
    table(
      ["Field", "Value"],
      [
        row([cell("Protocol"), cell(tls.protocol)]),
        row([cell("Cipher"), cell(tls.cipher?.name)]),
        row([cell("Not before"), cell(tls.notBefore)]),
        row([cell("Not after"), cell(tls.notAfter)]),
        row([cell("Subject alt names"), cell(tls.san.join(", "))]),
        row([cell("Health"), severityCell(tls.severity)]),
        row([cell("Reason"), cell(tls.severityReason)]),
      ],
    ),
  );
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function renderHtmlReport(report: ScanReport): string {
  const { high, medium, low } = report.severitySummary;
  const title = `Recon report: ${escapeHtml(report.target)}`;

  const sections: string[] = [
    "<!DOCTYPE html>",
    `<html lang="en">`,
    "<head>",
    `<meta charset="utf-8">`,
    `<title>${title}</title>`,
    `<style>${STYLE}</style>`,
    "</head>",
    "<body>",
    `<h1>${title}</h1>`,
    `<p class="muted">Scanned at ${escapeHtml(report.scannedAt)}</p>`,
    "<h2>Summary</h2>",
    `<p><span class="sev-high">High: ${high}</span> &middot; ` +
      `<span class="sev-medium">Medium: ${medium}</span> &middot; ` +
      `<span class="sev-low">Low: ${low}</span> &middot; ` +
      `Total findings: ${report.findings.length}</p>`,
    ...renderFindings(report),
    ...renderDns(report),
    ...renderPorts(report),
    ...renderHttp(report),
    ...renderTls(report.tls),
    "</body>",
    "</html>",
  ];

  return sections.join("\n") + "\n";
}
