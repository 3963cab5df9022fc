/**
 * Backend interfaces for the network primitives the probes sit on.
 *
 * The probes own parsing, error wording and result shaping; a backend only
 * performs the raw operation, so each one can be replaced (tests use
 * in-process fakes) without touching the core.
 */

import type { DistinguishedName, DnsRecordType, TlsCipher } from "../types.js";

/** Options passed to every backend call. */
export interface BackendCallOptions {
  /** Per-call timeout in ms. */
  timeoutMs: number;
  /** Aborted when the coordinator gives up on the probe. */
  signal?: AbortSignal;
}

export interface DnsBackend {
  name: string;
  /** Resolve the host to its first address. */
  lookup(host: string, options: BackendCallOptions): Promise<string>;
  /** Resolve one record type. Rejects with an error carrying a DNS `code` on failure. */
  resolve(host: string, recordType: DnsRecordType, options: BackendCallOptions): Promise<string[]>;
}

export interface ProcessOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface PortScanBackend {
  /** Executable name, e.g. "nmap". */
  name: string;
  /** Check if the scanner is installed and runnable. */
  isAvailable(): Promise<boolean>;
  run(args: string[], options: BackendCallOptions): Promise<ProcessOutcome>;
}

export interface HttpResponseInfo {
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

export interface HttpBackend {
  name: string;
  /** GET the URL. Rejects on connection, protocol or timeout failure. */
  get(url: string, options: BackendCallOptions): Promise<HttpResponseInfo>;
}

export interface PeerCertificateInfo {
  subject: DistinguishedName;
  issuer: DistinguishedName;
  /** Raw subjectAltName entries, e.g. ["DNS:example.com"]. */
  subjectAltNames: string[];
  /** Certificate validity as printed by the TLS library, e.g. "Jan  1 00:00:00 2025 GMT". */
  validFrom: string | null;
  validTo: string | null;
  protocol: string | null;
  cipher: TlsCipher | null;
}

export interface TlsBackend {
  name: string;
  handshake(host: string, port: number, options: BackendCallOptions): Promise<PeerCertificateInfo>;
}

export interface ProbeBackends {
  dns: DnsBackend;
  portScanner: PortScanBackend;
  http: HttpBackend;
  tls: TlsBackend;
}
