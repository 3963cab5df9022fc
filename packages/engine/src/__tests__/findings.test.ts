import { describe, it, expect } from "vitest";
import { annotateReport, buildFindings } from "../findings.js";
import { pickSecurityHeaders } from "../probes/http.js";
import type { ProbeReport } from "../types.js";
import { NOW, httpOutcome, makeProbeReport } from "./fixtures.js";

function scenarioReport(): ProbeReport {
  return makeProbeReport({
    nmap: {
      available: true,
      skipped: false,
      error: null,
      command: "nmap -sT example.test",
      services: [
        { port: "22/tcp", state: "open", service: "ssh", version: "OpenSSH 8.9p1" },
        { port: "80/tcp", state: "open", service: "http", version: "nginx 1.24" },
      ],
      stdout: "",
      stderr: "",
    },
    http: {
      // Reached, but the header map was never filled in
      http: {
        url: "http://example.test/",
        ok: true,
        statusCode: 200,
        server: null,
        securityHeaders: {},
        error: null,
      },
      https: httpOutcome("https://example.test/", true, {
        "strict-transport-security": "max-age=63072000",
        "x-frame-options": "DENY",
        "x-content-type-options": "nosniff",
        "referrer-policy": "no-referrer",
        "permissions-policy": "camera=()",
      }),
    },
    tls: {
      ok: true,
      subject: { CN: "example.test" },
      issuer: { CN: "Test CA" },
      san: ["example.test"],
      notBefore: "2025-01-01T00:00:00.000Z",
      notAfter: "2025-06-05T00:00:00.000Z",
      protocol: "TLSv1.3",
      cipher: null,
    },
  });
}

describe("buildFindings", () => {
  it("walks services, then headers, then TLS", () => {
    expect(buildFindings(scenarioReport(), NOW)).toEqual([
      {
        category: "open_port",
        target: "22/tcp",
        severity: "high",
        title: "Open port 22/tcp",
        details: "SSH exposed",
        service: "ssh",
      },
      {
        category: "open_port",
        target: "80/tcp",
        severity: "low",
        title: "Open port 80/tcp",
        details: "Common web service",
        service: "http",
      },
      {
        category: "missing_security_header",
        target: "https",
        severity: "medium",
        title: "Missing header: content-security-policy",
        details: "HTTPS response is missing content-security-policy",
      },
      {
        category: "tls_certificate",
        target: "example.test",
        severity: "high",
        title: "TLS certificate health",
        details: "Certificate expires soon (4 days)",
      },
    ]);
  });

  it("emits no header findings for an empty header map", () => {
    const findings = buildFindings(scenarioReport(), NOW);
    expect(findings.filter((f) => f.target === "http")).toEqual([]);
  });

  it("emits all six headers in canonical order when none were sent", () => {
    const report = makeProbeReport({
      http: {
        http: httpOutcome("http://example.test/", true),
        https: httpOutcome("https://example.test/", false),
      },
    });
    expect(buildFindings(report, NOW).map((f) => `${f.severity} ${f.title}`)).toEqual([
      "medium Missing header: strict-transport-security",
      "medium Missing header: content-security-policy",
      "medium Missing header: x-frame-options",
      "low Missing header: x-content-type-options",
      "low Missing header: referrer-policy",
      "low Missing header: permissions-policy",
    ]);
  });

  it("skips headers for a failed probe", () => {
    const report = makeProbeReport();
    expect(buildFindings(report, NOW)).toEqual([]);
  });

  it("treats an empty header value as present", () => {
    const headers = pickSecurityHeaders({
      "strict-transport-security": "",
      "content-security-policy": "default-src 'self'",
      "x-frame-options": "DENY",
      "x-content-type-options": "nosniff",
      "referrer-policy": "no-referrer",
      "permissions-policy": "",
    });
    const report = makeProbeReport({
      http: {
        http: httpOutcome("http://example.test/", false),
        https: { ...httpOutcome("https://example.test/", true), securityHeaders: headers },
      },
    });
    expect(buildFindings(report, NOW)).toEqual([]);
  });

  it("produces no TLS finding when TLS failed", () => {
    const report = makeProbeReport({ tls: { ok: false, error: "handshake failed" } });
    expect(buildFindings(report, NOW).some((f) => f.category === "tls_certificate")).toBe(false);
  });
});

describe("annotateReport", () => {
  it("annotates services and TLS and summarises", () => {
    const annotated = annotateReport(scenarioReport(), NOW);

    expect(annotated.nmap.services[0]).toMatchObject({ severity: "high", severityReason: "SSH exposed" });
    expect(annotated.nmap.services[1]).toMatchObject({ severity: "low", severityReason: "Common web service" });
    expect(annotated.tls).toMatchObject({
      ok: true,
      severity: "high",
      severityReason: "Certificate expires soon (4 days)",
    });
    expect(annotated.severitySummary).toEqual({ high: 2, medium: 1, low: 1 });
  });

  it("does not modify the probe report", () => {
    const report = scenarioReport();
    const before = structuredClone(report);
    annotateReport(report, NOW);
    expect(report).toEqual(before);
  });

  it("shares no section with the probe report", () => {
    const report = scenarioReport();
    const annotated = annotateReport(report, NOW);

    annotated.dns.errors.push("later edit");
    annotated.http.https.securityHeaders["x-frame-options"] = "DENY";
    annotated.settings.timeout = 99;

    expect(report.dns.errors).toEqual(scenarioReport().dns.errors);
    expect(report.http.https.securityHeaders).toEqual(scenarioReport().http.https.securityHeaders);
    expect(report.settings.timeout).toBe(2);
  });

  it("is idempotent", () => {
    const once = annotateReport(scenarioReport(), NOW);
    const twice = annotateReport(once, NOW);
    expect(twice).toEqual(once);
    expect(twice.findings).toHaveLength(4);
  });

  it("yields an empty summary for a report with nothing found", () => {
    const annotated = annotateReport(makeProbeReport(), NOW);
    expect(annotated.findings).toEqual([]);
    expect(annotated.severitySummary).toEqual({ high: 0, medium: 0, low: 0 });
  });
});
