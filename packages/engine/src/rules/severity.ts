/**
 * Severity policy.
 *
 * Pure functions mapping a raw condition (open port, missing header,
 * certificate expiry) to a severity and a human-readable reason. The port
 * and header tables are the security policy itself.
 */

import type { Severity } from "../schemas.js";
import type { SecurityHeaderName } from "../types.js";

export interface SeverityVerdict {
  severity: Severity;
  reason: string;
}

export const HIGH_RISK_PORTS: Readonly<Record<string, string>> = {
  "21": "FTP exposed",
  "22": "SSH exposed",
  "23": "Telnet exposed",
  "25": "SMTP exposed",
  "3389": "RDP exposed",
  "445": "SMB exposed",
  "1433": "MSSQL exposed",
  "3306": "MySQL exposed",
};

export const MEDIUM_RISK_PORTS: Readonly<Record<string, string>> = {
  "53": "DNS service exposed",
  "111": "RPC exposed",
  "139": "NetBIOS exposed",
  "5900": "VNC exposed",
  "8080": "Alt HTTP exposed",
};

export const WEB_PORTS: ReadonlySet<string> = new Set(["80", "443"]);

export const MEDIUM_SEVERITY_HEADERS: ReadonlySet<string> = new Set<SecurityHeaderName>([
  "content-security-policy",
  "strict-transport-security",
  "x-frame-options",
]);

const DAY_MS = 24 * 60 * 60 * 1000;

/** "22/tcp" → "22" */
function portNumber(portSpec: string): string {
  return portSpec.split("/")[0];
}

function lookupPort(table: Readonly<Record<string, string>>, port: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, port) ? table[port] : undefined;
}

export function severityForPort(portSpec: string): SeverityVerdict {
  const port = portNumber(portSpec);

  const high = lookupPort(HIGH_RISK_PORTS, port);
  if (high !== undefined) return { severity: "high", reason: high };

  const medium = lookupPort(MEDIUM_RISK_PORTS, port);
  if (medium !== undefined) return { severity: "medium", reason: medium };

  if (WEB_PORTS.has(port)) return { severity: "low", reason: "Common web service" };
  return { severity: "low", reason: "Open port" };
}

export function severityForMissingHeader(header: string): Severity {
  return MEDIUM_SEVERITY_HEADERS.has(header) ? "medium" : "low";
}

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/** Date.parse rolls 2025-02-30 over into March. */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parse an ISO-8601 timestamp to epoch ms. Timestamps without an offset
 * are read as UTC. Returns null for anything else.
 */
export function parseIsoTimestamp(value: string): number | null {
  const match = ISO_8601.exec(value);
  if (!match) return null;
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) return null;

  let normalized = value.replace(" ", "T");
  const hasTime = normalized.includes("T");
  if (hasTime && match[4] === undefined) normalized += "Z";
  // "+0000" → "+00:00"
  normalized = normalized.replace(/([+-]\d{2})(\d{2})$/, "$1:$2");

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : ms;
}

export function severityForTlsWindow(
  notAfter: string | null | undefined,
  now: Date = new Date(),
): SeverityVerdict {
  if (!notAfter) {
    return { severity: "low", reason: "Certificate expiration unknown" };
  }

  const expiry = parseIsoTimestamp(notAfter);
  if (expiry === null) {
    return { severity: "low", reason: "Certificate expiration format unknown" };
  }

  const remainingMs = expiry - now.getTime();
  if (remainingMs < 0) {
    return { severity: "high", reason: "Certificate expired" };
  }

  const daysRemaining = Math.floor(remainingMs / DAY_MS);
  if (daysRemaining <= 14) {
    return { severity: "high", reason: `Certificate expires soon (${daysRemaining} days)` };
  }
  if (daysRemaining <= 45) {
    return { severity: "medium", reason: `Certificate expires soon-ish (${daysRemaining} days)` };
  }
  return { severity: "low", reason: `Certificate valid (${daysRemaining} days remaining)` };
}
