import type { ProbeBackends } from "../probes/types.js";
import type { ScanSettings } from "../schemas.js";
import type { HttpProbeOutcome, ProbeReport } from "../types.js";
import { pickSecurityHeaders } from "../probes/http.js";

export const NOW = new Date("2025-06-01T00:00:00Z");

export const SETTINGS: ScanSettings = {
  timeout: 2,
  httpTimeout: 2,
  tlsTimeout: 2,
  nmapArgs: "-sT -Pn --top-ports 100",
  dns: true,
  http: true,
  tls: true,
  nmap: true,
};

export const NMAP_STDOUT = [
  "Starting Nmap 7.94 ( https://nmap.org )",
  "PORT    STATE  SERVICE VERSION",
  "22/tcp  open   ssh     OpenSSH 8.9p1 Ubuntu",
  "80/tcp  open   http    nginx 1.24",
  "443/tcp closed https",
  "",
].join("\n");

export function dnsError(code: string): Error {
  return Object.assign(new Error(`query failed ${code}`), { code });
}

/** In-process backends for a healthy target that sends only HSTS. */
export function fakeBackends(overrides: Partial<ProbeBackends> = {}): ProbeBackends {
  return {
    dns: {
      name: "fake-dns",
      lookup: async () => "192.0.2.10",
      resolve: async (_host, rtype) => {
        if (rtype === "A") return ["192.0.2.10"];
        throw dnsError("ENODATA");
      },
    },
    portScanner: {
      name: "nmap",
      isAvailable: async () => true,
      run: async () => ({ exitCode: 0, stdout: NMAP_STDOUT, stderr: "", timedOut: false }),
    },
    http: {
      name: "fake-http",
      get: async () => ({
        status: 200,
        statusText: "OK",
        headers: { Server: "nginx", "Strict-Transport-Security": "max-age=63072000" },
      }),
    },
    tls: {
      name: "fake-tls",
      handshake: async () => ({
        subject: { CN: "example.test" },
        issuer: { CN: "Test CA" },
        subjectAltNames: ["DNS:example.test"],
        validFrom: "Jan  1 00:00:00 2025 GMT",
        validTo: "Jun  5 00:00:00 2025 GMT",
        protocol: "TLSv1.3",
        cipher: { name: "TLS_AES_128_GCM_SHA256", standardName: "TLS_AES_128_GCM_SHA256", version: "TLSv1.3" },
      }),
    },
    ...overrides,
  };
}

export function httpOutcome(
  url: string,
  ok: boolean,
  headers: Record<string, string> = {},
): HttpProbeOutcome {
  return {
    url,
    ok,
    statusCode: ok ? 200 : null,
    server: null,
    securityHeaders: pickSecurityHeaders(headers),
    error: ok ? null : "connection refused",
  };
}

/** A probe report with nothing found. Override sections per test. */
export function makeProbeReport(overrides: Partial<ProbeReport> = {}): ProbeReport {
  return {
    target: "example.test",
    scannedAt: NOW.toISOString(),
    settings: { ...SETTINGS },
    dns: { target: "example.test", resolvedIp: "192.0.2.10", records: {}, errors: [] },
    nmap: {
      available: true,
      skipped: false,
      error: null,
      command: "nmap example.test",
      services: [],
      stdout: "",
      stderr: "",
    },
    http: {
      http: httpOutcome("http://example.test/", false),
      https: httpOutcome("https://example.test/", false),
    },
    tls: { ok: false, error: "HTTPS probe failed; TLS details unavailable." },
    ...overrides,
  };
}
