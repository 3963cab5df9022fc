import { describe, it, expect } from "vitest";
import { getPolicy, type Finding, type ScanReport } from "@reconnoiter/engine";
import { SUMMARY_FINDING_LIMIT, formatPolicy, formatSummary } from "../formatter.js";

function openPort(port: number): Finding {
  return {
    category: "open_port",
    target: `${port}/tcp`,
    severity: "low",
    title: `Open port ${port}/tcp`,
    details: "Open port",
    service: "unknown",
  };
}

function makeReport(findings: Finding[]): ScanReport {
  const headers = {};
  return {
    target: "example.test",
    scannedAt: "2025-06-01T00:00:00.000Z",
    settings: {
      timeout: 8,
      httpTimeout: 8,
      tlsTimeout: 8,
      nmapArgs: "-sT",
      dns: true,
      http: true,
      tls: true,
      nmap: false,
    },
    dns: { target: "example.test", resolvedIp: "192.0.2.10", records: {}, errors: ["MX lookup failed: x"] },
    nmap: {
      available: false,
      skipped: true,
      error: "Port scan disabled by configuration.",
      command: null,
      services: [],
      stdout: "",
      stderr: "",
    },
    http: {
      http: { url: "http://example.test/", ok: true, statusCode: 301, server: null, securityHeaders: headers, error: null },
      https: { url: "https://example.test/", ok: true, statusCode: 200, server: null, securityHeaders: headers, error: null },
    },
    tls: {
      ok: true,
      subject: {},
      issuer: {},
      san: [],
      notBefore: null,
      notAfter: null,
      protocol: "TLSv1.3",
      cipher: null,
    },
    findings,
    severitySummary: { high: 0, medium: 0, low: findings.length },
  };
}

describe("formatSummary", () => {
  it("prints one line per probe", () => {
    const lines = formatSummary(makeReport([]), { noColor: true }).split("\n");
    expect(lines).toContain("Recon Summary: example.test");
    expect(lines).toContain(`  ${"DNS".padEnd(8)}  resolved_ip=192.0.2.10 errors=1`);
    expect(lines).toContain(`  ${"Nmap".padEnd(8)}  unavailable (Port scan disabled by configuration.)`);
    expect(lines).toContain(`  ${"HTTP(S)".padEnd(8)}  http=301 https=200`);
    expect(lines).toContain(`  ${"TLS".padEnd(8)}  ok`);
  });

  it("says so when there are no findings", () => {
    const lines = formatSummary(makeReport([]), { noColor: true }).split("\n");
    expect(lines).toContain("  LOW     No notable findings  No findings were generated");
    expect(lines).toContain("  Total findings: 0");
  });

  it("lists only the first findings", () => {
    const findings = Array.from({ length: SUMMARY_FINDING_LIMIT + 2 }, (_, i) => openPort(8000 + i));
    const lines = formatSummary(makeReport(findings), { noColor: true }).split("\n");

    expect(lines).toContain("  LOW     Open port 8000/tcp  Open port");
    expect(lines).toContain("  LOW     Open port 8011/tcp  Open port");
    expect(lines).not.toContain("  LOW     Open port 8012/tcp  Open port");
    expect(lines).toContain("  ... and 2 more (see report)");
    expect(lines).toContain("  High: 0  Medium: 0  Low: 14");
  });

  it("colours severities unless disabled", () => {
    const text = formatSummary(makeReport([openPort(8000)]));
    expect(text).toContain("\x1b[1m\x1b[36mLOW   \x1b[0m");
  });
});

describe("formatPolicy", () => {
  it("prints both tables", () => {
    const text = formatPolicy(getPolicy(), { noColor: true });
    const lines = text.split("\n");
    expect(lines).toContain("Open ports");
    expect(lines).toContain("Missing security headers");
    expect(lines).toContain(`  ${"22".padEnd(4)}  HIGH    SSH exposed`);
    expect(lines).toContain(
      `  ${"content-security-policy".padEnd(25)}  MEDIUM  Response is missing content-security-policy`,
    );
  });
});
