import { describe, it, expect } from "vitest";
import {
  parseIsoTimestamp,
  severityForMissingHeader,
  severityForPort,
  severityForTlsWindow,
} from "../severity.js";

const NOW = new Date("2025-06-01T00:00:00Z");

describe("severityForPort", () => {
  it.each([
    ["21/tcp", "FTP exposed"],
    ["22/tcp", "SSH exposed"],
    ["23/tcp", "Telnet exposed"],
    ["25/tcp", "SMTP exposed"],
    ["3389/tcp", "RDP exposed"],
    ["445/tcp", "SMB exposed"],
    ["1433/tcp", "MSSQL exposed"],
    ["3306/tcp", "MySQL exposed"],
  ])("maps %s to high", (port, reason) => {
    expect(severityForPort(port)).toEqual({ severity: "high", reason });
  });

  it.each(["53/tcp", "111/tcp", "139/tcp", "5900/tcp", "8080/tcp"])("maps %s to medium", (port) => {
    expect(severityForPort(port).severity).toBe("medium");
  });

  it("maps web ports to low", () => {
    expect(severityForPort("80/tcp")).toEqual({ severity: "low", reason: "Common web service" });
    expect(severityForPort("443/tcp")).toEqual({ severity: "low", reason: "Common web service" });
  });

  it("maps any other port to low", () => {
    expect(severityForPort("9999/tcp")).toEqual({ severity: "low", reason: "Open port" });
  });

  it("accepts a bare port number", () => {
    expect(severityForPort("22")).toEqual({ severity: "high", reason: "SSH exposed" });
  });

  it("ignores inherited object keys", () => {
    expect(severityForPort("constructor/tcp")).toEqual({ severity: "low", reason: "Open port" });
  });
});

describe("severityForMissingHeader", () => {
  it("rates the three framing/transport headers medium", () => {
    expect(severityForMissingHeader("content-security-policy")).toBe("medium");
    expect(severityForMissingHeader("strict-transport-security")).toBe("medium");
    expect(severityForMissingHeader("x-frame-options")).toBe("medium");
  });

  it("rates the rest low", () => {
    expect(severityForMissingHeader("permissions-policy")).toBe("low");
    expect(severityForMissingHeader("referrer-policy")).toBe("low");
    expect(severityForMissingHeader("x-content-type-options")).toBe("low");
  });
});

describe("severityForTlsWindow", () => {
  it("rates an expired certificate high", () => {
    expect(severityForTlsWindow("2025-05-01T00:00:00Z", NOW)).toEqual({
      severity: "high",
      reason: "Certificate expired",
    });
  });

  it("rates 7 days out high", () => {
    expect(severityForTlsWindow("2025-06-08T00:00:00Z", NOW)).toEqual({
      severity: "high",
      reason: "Certificate expires soon (7 days)",
    });
  });

  it("rates 90 days out low", () => {
    expect(severityForTlsWindow("2025-08-30T00:00:00Z", NOW)).toEqual({
      severity: "low",
      reason: "Certificate valid (90 days remaining)",
    });
  });

  it("fails open on a missing date", () => {
    expect(severityForTlsWindow(null, NOW)).toEqual({
      severity: "low",
      reason: "Certificate expiration unknown",
    });
  });

  it("fails open on an unparseable date", () => {
    expect(severityForTlsWindow("Jan 99 garbage", NOW)).toEqual({
      severity: "low",
      reason: "Certificate expiration format unknown",
    });
  });

  it("treats 14 days as high and 15 as medium", () => {
    expect(severityForTlsWindow("2025-06-15T00:00:00Z", NOW).severity).toBe("high");
    expect(severityForTlsWindow("2025-06-16T00:00:00Z", NOW)).toEqual({
      severity: "medium",
      reason: "Certificate expires soon-ish (15 days)",
    });
  });

  it("treats 45 days as medium and 46 as low", () => {
    expect(severityForTlsWindow("2025-07-16T00:00:00Z", NOW)).toEqual({
      severity: "medium",
      reason: "Certificate expires soon-ish (45 days)",
    });
    expect(severityForTlsWindow("2025-07-17T00:00:00Z", NOW)).toEqual({
      severity: "low",
      reason: "Certificate valid (46 days remaining)",
    });
  });

  it("truncates partial days", () => {
    expect(severityForTlsWindow("2025-06-08T12:00:00Z", NOW).reason).toBe(
      "Certificate expires soon (7 days)",
    );
  });

  it("expiring right now is not yet expired", () => {
    expect(severityForTlsWindow("2025-06-01T00:00:00Z", NOW)).toEqual({
      severity: "high",
      reason: "Certificate expires soon (0 days)",
    });
  });
});

describe("parseIsoTimestamp", () => {
  it("reads timestamps without an offset as UTC", () => {
    expect(parseIsoTimestamp("2025-06-08T00:00:00")).toBe(Date.UTC(2025, 5, 8));
  });

  it("accepts compact offsets", () => {
    expect(parseIsoTimestamp("2025-06-08T02:00:00+0200")).toBe(Date.UTC(2025, 5, 8));
  });

  it("accepts a space separator and fractional seconds", () => {
    expect(parseIsoTimestamp("2025-06-08 00:00:00.000Z")).toBe(Date.UTC(2025, 5, 8));
  });

  it("rejects certificate-style dates", () => {
    expect(parseIsoTimestamp("Jun  8 00:00:00 2025 GMT")).toBeNull();
  });

  it("rejects dates that are not on the calendar", () => {
    expect(parseIsoTimestamp("2025-02-30T00:00:00Z")).toBeNull();
    expect(parseIsoTimestamp("2025-13-01")).toBeNull();
    expect(parseIsoTimestamp("2024-02-29T00:00:00Z")).toBe(Date.UTC(2024, 1, 29));
  });

  it("treats an impossible expiry date as an unknown format", () => {
    expect(severityForTlsWindow("2025-02-30T00:00:00Z", new Date("2025-01-01T00:00:00Z"))).toEqual({
      severity: "low",
      reason: "Certificate expiration format unknown",
    });
  });
});
