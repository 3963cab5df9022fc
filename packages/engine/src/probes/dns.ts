/**
 * DNS probe — resolves the target's address and its A/AAAA/CNAME/NS/MX/TXT
 * records. IP targets skip record lookups entirely.
 */

import { Resolver, lookup } from "node:dns/promises";
import { isIP } from "node:net";
import { DNS_RECORD_TYPES, type DnsRecordType, type DnsResult } from "../types.js";
import type { BackendCallOptions, DnsBackend } from "./types.js";
import { withDeadline } from "./deadline.js";

/** Answers that mean "nothing there" rather than a failed lookup. */
const EMPTY_ANSWER_CODES = new Set(["ENODATA", "ENOTFOUND", "ESERVFAIL", "EREFUSED"]);

export function isIpTarget(target: string): boolean {
  return isIP(target) !== 0;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ResolveDnsOptions {
  /** Seconds, applied to each lookup. */
  timeout: number;
  signal?: AbortSignal;
}

export async function resolveDns(
  target: string,
  backend: DnsBackend,
  options: ResolveDnsOptions,
): Promise<DnsResult> {
  const result: DnsResult = {
    target,
    resolvedIp: null,
    records: {},
    errors: [],
  };

  if (isIpTarget(target)) {
    result.resolvedIp = target;
    return result;
  }

  const timeoutMs = options.timeout * 1000;
  const call = <T>(label: string, fn: (opts: BackendCallOptions) => Promise<T>) =>
    withDeadline(label, timeoutMs, options.signal, (signal) => fn({ timeoutMs, signal }));

  const [address, ...answers] = await Promise.allSettled([
    call(`lookup ${target}`, (opts) => backend.lookup(target, opts)),
    ...DNS_RECORD_TYPES.map((rtype) =>
      call(`${rtype} ${target}`, (opts) => backend.resolve(target, rtype, opts)),
    ),
  ]);

  if (address.status === "fulfilled") {
    result.resolvedIp = address.value;
  } else {
    result.errors.push(`Resolution failed: ${errorMessage(address.reason)}`);
  }

  DNS_RECORD_TYPES.forEach((rtype, i) => {
    const answer = answers[i];
    if (answer.status === "fulfilled") {
      result.records[rtype] = answer.value;
      return;
    }
    result.records[rtype] = [];
    const code = errorCode(answer.reason);
    if (code !== undefined && EMPTY_ANSWER_CODES.has(code)) return;
    result.errors.push(`${rtype} lookup failed: ${errorMessage(answer.reason)}`);
  });

  return result;
}

// ---------------------------------------------------------------------------
// node:dns backend
// ---------------------------------------------------------------------------

function formatTxt(chunks: string[]): string {
  return chunks.map((chunk) => `"${chunk}"`).join(" ");
}

async function resolveWith(resolver: Resolver, host: string, rtype: DnsRecordType): Promise<string[]> {
  switch (rtype) {
    case "A":
      return resolver.resolve4(host);
    case "AAAA":
      return resolver.resolve6(host);
    case "CNAME":
      return resolver.resolveCname(host);
    case "NS":
      return resolver.resolveNs(host);
    case "MX": {
      const records = await resolver.resolveMx(host);
      return records.map((mx) => `${mx.priority} ${mx.exchange}`);
    }
    case "TXT": {
      const records = await resolver.resolveTxt(host);
      return records.map(formatTxt);
    }
  }
}

export const nodeDnsBackend: DnsBackend = {
  name: "node:dns",

  async lookup(host: string): Promise<string> {
    const { address } = await lookup(host);
    return address;
  },

  async resolve(host: string, rtype: DnsRecordType, options: BackendCallOptions): Promise<string[]> {
    const resolver = new Resolver({ timeout: options.timeoutMs, tries: 1 });
    const cancel = () => resolver.cancel();
    options.signal?.addEventListener("abort", cancel, { once: true });
    try {
      return await resolveWith(resolver, host, rtype);
    } finally {
      options.signal?.removeEventListener("abort", cancel);
    }
  },
};
