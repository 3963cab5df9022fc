/**
 * TLS probe — handshake with SNI and read the peer certificate.
 */

import { isIP } from "node:net";
import { connect, type PeerCertificate } from "node:tls";
import type { DistinguishedName, TlsResult } from "../types.js";
import type { BackendCallOptions, PeerCertificateInfo, TlsBackend } from "./types.js";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** e.g. "Jan  1 00:00:00 2025 GMT" or "Jan 01 00:00:00 2025 GMT" */
const CERT_TIME = /^([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+(?:GMT|UTC)$/;

/**
 * Convert a certificate validity string to ISO-8601 UTC.
 * Returns the input unchanged when it is not in the certificate format.
 */
export function parseCertTime(value: string | null | undefined): string | null {
  if (!value) return null;

  const match = CERT_TIME.exec(value.trim());
  if (!match) return value;

  const [, mon, day, hh, mm, ss, year] = match;
  const month = MONTHS.indexOf(mon);
  if (month < 0) return value;

  const ms = Date.UTC(Number(year), month, Number(day), Number(hh), Number(mm), Number(ss));
  const date = new Date(ms);
  // Reject overflowing fields such as "Feb 31"
  if (date.getUTCDate() !== Number(day) || date.getUTCHours() !== Number(hh)) return value;

  return date.toISOString();
}

/** "DNS:example.com, IP Address:10.0.0.1" → ["example.com", "10.0.0.1"] */
export function parseSubjectAltNames(entries: string[]): string[] {
  const names: string[] = [];
  for (const entry of entries) {
    const sep = entry.indexOf(":");
    if (sep < 0) continue;
    names.push(entry.slice(sep + 1).trim());
  }
  return names;
}

export interface ProbeTlsOptions {
  /** Seconds. */
  timeout: number;
  port?: number;
  signal?: AbortSignal;
}

export async function probeTls(
  host: string,
  backend: TlsBackend,
  options: ProbeTlsOptions,
): Promise<TlsResult> {
  try {
    const info = await backend.handshake(host, options.port ?? 443, {
      timeoutMs: options.timeout * 1000,
      signal: options.signal,
    });
    return {
      ok: true,
      subject: info.subject,
      issuer: info.issuer,
      san: parseSubjectAltNames(info.subjectAltNames),
      notBefore: parseCertTime(info.validFrom),
      notAfter: parseCertTime(info.validTo),
      protocol: info.protocol,
      cipher: info.cipher,
    };
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

// ---------------------------------------------------------------------------
// node:tls backend
// ---------------------------------------------------------------------------

function toDistinguishedName(name: PeerCertificate["subject"] | undefined): DistinguishedName {
  const out: DistinguishedName = {};
  if (!name) return out;
  for (const [key, value] of Object.entries(name)) {
    if (typeof value === "string" || Array.isArray(value)) out[key] = value;
  }
  return out;
}

export const nodeTlsBackend: TlsBackend = {
  name: "node:tls",

  handshake(host: string, port: number, options: BackendCallOptions): Promise<PeerCertificateInfo> {
    return new Promise((resolve, reject) => {
      // SNI must not carry an IP literal
      const socket = connect({ host, port, servername: isIP(host) ? undefined : host });

      const onAbort = () => socket.destroy(new Error("TLS handshake cancelled"));
      options.signal?.addEventListener("abort", onAbort, { once: true });
      const cleanup = () => options.signal?.removeEventListener("abort", onAbort);

      socket.setTimeout(options.timeoutMs, () => {
        socket.destroy(new Error(`TLS handshake timed out after ${options.timeoutMs}ms`));
      });

      socket.once("secureConnect", () => {
        const cert = socket.getPeerCertificate();
        const cipher = socket.getCipher();
        const info: PeerCertificateInfo = {
          subject: toDistinguishedName(cert.subject),
          issuer: toDistinguishedName(cert.issuer),
          subjectAltNames: cert.subjectaltname ? cert.subjectaltname.split(/,\s*/) : [],
          validFrom: cert.valid_from || null,
          validTo: cert.valid_to || null,
          protocol: socket.getProtocol(),
          cipher: { name: cipher.name, standardName: cipher.standardName, version: cipher.version },
        };
        cleanup();
        socket.setTimeout(0);
        socket.end();
        resolve(info);
      });

      socket.on("error", (err) => {
        cleanup();
        reject(err);
      });
    });
  },
};
