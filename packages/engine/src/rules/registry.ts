/**
 * Policy registry.
 *
 * Flattens the severity tables into rows so the CLI can list what each
 * condition maps to.
 */

import type { Severity } from "../schemas.js";
import { SECURITY_HEADERS } from "../types.js";
import {
  HIGH_RISK_PORTS,
  MEDIUM_RISK_PORTS,
  WEB_PORTS,
  severityForMissingHeader,
} from "./severity.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PolicyRule {
  /** "port" rows match an open port, "header" rows a missing response header. */
  kind: "port" | "header";
  match: string;
  severity: Severity;
  reason: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function getPortPolicy(): PolicyRule[] {
  const rows: PolicyRule[] = [];
  for (const [port, reason] of Object.entries(HIGH_RISK_PORTS)) {
    rows.push({ kind: "port", match: port, severity: "high", reason });
  }
  for (const [port, reason] of Object.entries(MEDIUM_RISK_PORTS)) {
    rows.push({ kind: "port", match: port, severity: "medium", reason });
  }
  for (const port of WEB_PORTS) {
    rows.push({ kind: "port", match: port, severity: "low", reason: "Common web service" });
  }
  rows.push({ kind: "port", match: "*", severity: "low", reason: "Open port" });
  return rows;
}

export function getHeaderPolicy(): PolicyRule[] {
  return SECURITY_HEADERS.map((header): PolicyRule => ({
    kind: "header",
    match: header,
    severity: severityForMissingHeader(header),
    reason: `Response is missing ${header}`,
  }));
}

/**
 * Returns every policy row, ports first. Filter by kind with `"port"` or
 * `"header"`.
 */
export function getPolicy(kind?: PolicyRule["kind"]): PolicyRule[] {
  const all = [...getPortPolicy(), ...getHeaderPolicy()];
  return kind ? all.filter((rule) => rule.kind === kind) : all;
}
