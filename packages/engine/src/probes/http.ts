/**
 * HTTP(S) probe — GETs the target's root over both schemes and records
 * status, Server banner and the security headers.
 */

import { isIP } from "node:net";
import {
  SECURITY_HEADERS,
  type HttpProbeOutcome,
  type HttpScheme,
  type SecurityHeaders,
} from "../types.js";
import type { BackendCallOptions, HttpBackend, HttpResponseInfo } from "./types.js";

export const USER_AGENT = "reconnoiter/0.1";

/** Root URL of the target; IPv6 literals are bracketed. */
export function rootUrl(scheme: HttpScheme, target: string): string {
  const host = isIP(target) === 6 ? `[${target}]` : target;
  return `${scheme}://${host}/`;
}

/** Lower-case header names; values are kept as sent. */
export function normalizeHeaders(headers: Record<string, string>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = value;
  }
  return normalized;
}

export function pickSecurityHeaders(headers: Record<string, string>): SecurityHeaders {
  const picked: SecurityHeaders = {};
  for (const name of SECURITY_HEADERS) {
    picked[name] = headers[name] ?? null;
  }
  return picked;
}

export function emptySecurityHeaders(): SecurityHeaders {
  return pickSecurityHeaders({});
}

/** Node's fetch reports transport failures as "fetch failed" with the real reason in `cause`. */
function describeFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message) return `${err.message}: ${cause.message}`;
  return err.message;
}

export interface ProbeUrlOptions {
  /** Seconds. */
  timeout: number;
  signal?: AbortSignal;
}

export async function probeUrl(
  url: string,
  backend: HttpBackend,
  options: ProbeUrlOptions,
): Promise<HttpProbeOutcome> {
  let response: HttpResponseInfo;
  try {
    response = await backend.get(url, { timeoutMs: options.timeout * 1000, signal: options.signal });
  } catch (err: unknown) {
    return {
      url,
      ok: false,
      statusCode: null,
      server: null,
      securityHeaders: emptySecurityHeaders(),
      error: describeFailure(err),
    };
  }

  const headers = normalizeHeaders(response.headers);
  const ok = response.status < 400;
  return {
    url,
    ok,
    statusCode: response.status,
    server: headers["server"] ?? null,
    securityHeaders: pickSecurityHeaders(headers),
    error: ok ? null : `HTTP Error ${response.status}: ${response.statusText}`,
  };
}

// ---------------------------------------------------------------------------
// fetch backend
// ---------------------------------------------------------------------------

interface RequestSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/** Aborts with an error naming the cause, so it reaches the outcome's `error`. */
function requestSignal(timeoutMs: number, parent?: AbortSignal): RequestSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`HTTP request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onAbort = () => controller.abort(new Error("HTTP request was cancelled"));

  if (parent?.aborted) onAbort();
  else parent?.addEventListener("abort", onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}

export const fetchHttpBackend: HttpBackend = {
  name: "fetch",

  async get(url: string, options: BackendCallOptions): Promise<HttpResponseInfo> {
    const { signal, dispose } = requestSignal(options.timeoutMs, options.signal);
    try {
      const res = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": USER_AGENT },
        redirect: "follow",
        signal,
      });

      const headers: Record<string, string> = {};
      res.headers.forEach((value, name) => {
        headers[name] = value;
      });

      // Only headers matter; release the connection without reading the body
      await res.body?.cancel();

      return { status: res.status, statusText: res.statusText, headers };
    } catch (err: unknown) {
      const reason: unknown = signal.reason;
      if (signal.aborted && reason instanceof Error) throw reason;
      throw err;
    } finally {
      dispose();
    }
  },
};
