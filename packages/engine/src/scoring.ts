/**
 * Severity tallies.
 */

import { SeveritySchema, type Severity, type SeveritySummary } from "./schemas.js";

export const SEVERITY_ORDER: readonly Severity[] = ["low", "medium", "high"];

/**
 * Count findings per severity. Anything outside low/medium/high is
 * ignored rather than counted or rejected.
 */
export function summarizeSeverity(findings: ReadonlyArray<{ severity: string }>): SeveritySummary {
  const counts: SeveritySummary = { high: 0, medium: 0, low: 0 };
  for (const finding of findings) {
    const parsed = SeveritySchema.safeParse(finding.severity);
    if (!parsed.success) continue;
    counts[parsed.data] += 1;
  }
  return counts;
}

export function isSeverity(value: string): value is Severity {
  return SeveritySchema.safeParse(value).success;
}

/** True when any finding is at or above `threshold`. */
export function meetsThreshold(
  findings: ReadonlyArray<{ severity: Severity }>,
  threshold: Severity,
): boolean {
  const min = SEVERITY_ORDER.indexOf(threshold);
  return findings.some((f) => SEVERITY_ORDER.indexOf(f.severity) >= min);
}
