/**
 * Nmap integration — TCP service scan.
 *
 * Runs nmap with its normal (human-readable) output and picks the open
 * service lines out of it. The executable sits behind `PortScanBackend`
 * so a native scanner can replace it.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { PortScanResult, ServiceEntry } from "../types.js";
import type { BackendCallOptions, PortScanBackend, ProcessOutcome } from "./types.js";
import { logger } from "../logger.js";

const exec = promisify(execFile);

export const DEFAULT_NMAP_ARGS = "-sT -Pn --top-ports 1000 -sV";

/**
 * Split an argument string the way a POSIX shell would split words:
 * whitespace separates, single and double quotes group, backslash escapes
 * outside single quotes.
 */
export function splitArgs(input: string): string[] {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (ch === "\\" && i + 1 < input.length && (quote === null || input[i + 1] === '"' || input[i + 1] === "\\")) {
      current += input[++i];
      inWord = true;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else current += ch;
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new Error(`Unterminated ${quote} quote in arguments: ${input}`);
  }
  if (inWord) args.push(current);
  return args;
}

/**
 * Parse nmap's normal output into open services.
 *
 * Keeps lines mentioning `/tcp` with an `open` token, e.g.
 * `22/tcp   open  ssh     OpenSSH 8.9p1 Ubuntu`. Anything else is skipped.
 */
export function parseNmapOutput(stdout: string): ServiceEntry[] {
  const services: ServiceEntry[] = [];

  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.includes("/tcp")) continue;

    const parts = line.split(/\s+/);
    if (!parts.includes("open") || parts.length < 3) continue;

    const [port, state, service, ...rest] = parts;
    services.push({
      port,
      state,
      service,
      version: rest.join(" "),
    });
  }

  return services;
}

export interface PortScanOptions {
  /** Seconds; the process is killed after this long. */
  timeout: number;
  nmapArgs: string;
  signal?: AbortSignal;
}

export async function runPortScan(
  target: string,
  backend: PortScanBackend,
  options: PortScanOptions,
): Promise<PortScanResult> {
  if (!(await backend.isAvailable())) {
    return {
      available: false,
      skipped: false,
      error: `${backend.name} is not installed or not in PATH.`,
      command: null,
      services: [],
      stdout: "",
      stderr: "",
    };
  }

  const args = [...splitArgs(options.nmapArgs || DEFAULT_NMAP_ARGS), target];
  const command = [backend.name, ...args].join(" ");
  logger.debug(`[nmap] ${command}`);

  const outcome = await backend.run(args, {
    timeoutMs: options.timeout * 1000,
    signal: options.signal,
  });

  if (outcome.timedOut) {
    return {
      available: true,
      skipped: false,
      error: `${backend.name} timed out after ${options.timeout} seconds`,
      command,
      services: [],
      stdout: "",
      stderr: "",
    };
  }

  return {
    available: true,
    skipped: false,
    error: outcome.exitCode === 0 ? null : `${backend.name} exited with code ${outcome.exitCode}`,
    command,
    services: parseNmapOutput(outcome.stdout),
    stdout: outcome.stdout,
    stderr: outcome.stderr,
  };
}

// ---------------------------------------------------------------------------
// Executable backend
// ---------------------------------------------------------------------------

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
}

function asExecFailure(err: unknown): ExecFailure {
  const failure: ExecFailure = {};
  if (typeof err !== "object" || err === null) return failure;
  if ("code" in err && (typeof err.code === "number" || typeof err.code === "string")) {
    failure.code = err.code;
  }
  if ("killed" in err && typeof err.killed === "boolean") failure.killed = err.killed;
  if ("stdout" in err && typeof err.stdout === "string") failure.stdout = err.stdout;
  if ("stderr" in err && typeof err.stderr === "string") failure.stderr = err.stderr;
  return failure;
}

export function createNmapBackend(executable = "nmap"): PortScanBackend {
  return {
    name: executable,

    async isAvailable(): Promise<boolean> {
      try {
        await exec(executable, ["--version"], { timeout: 10_000 });
        return true;
      } catch {
        return false;
      }
    },

    async run(args: string[], options: BackendCallOptions): Promise<ProcessOutcome> {
      try {
        const { stdout, stderr } = await exec(executable, args, {
          timeout: options.timeoutMs,
          signal: options.signal,
          maxBuffer: 50 * 1024 * 1024,
        });
        return { exitCode: 0, stdout, stderr, timedOut: false };
      } catch (err: unknown) {
        const failure = asExecFailure(err);
        // A spawn failure (e.g. ENOENT) has no exit status to report
        if (typeof failure.code === "string") throw err;
        if (failure.killed) {
          return { exitCode: null, stdout: "", stderr: "", timedOut: true };
        }
        return {
          exitCode: typeof failure.code === "number" ? failure.code : null,
          stdout: failure.stdout ?? "",
          stderr: failure.stderr ?? "",
          timedOut: false,
        };
      }
    },
  };
}

export const nmapBackend: PortScanBackend = createNmapBackend();
