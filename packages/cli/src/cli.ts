#!/usr/bin/env node

import {
  ConfigError,
  ReportFormatSchema,
  SettingsError,
  isSeverity,
  type Severity,
} from "@reconnoiter/engine";
import { intFlag, parseArgs, UsageError } from "./args.js";
import { runScan, type ScanOptions } from "./commands/scan.js";
import { runInit } from "./commands/init.js";
import { runPolicy } from "./commands/policy.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mreconnoiter\x1b[0m — lightweight recon scanner
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  reconnoiter scan [target]         Scan a host or IP (and any config targets)
  reconnoiter init [dir]            Write a starter reconnoiter.yml (default: .)
  reconnoiter policy [port|header]  List the severity policy
  reconnoiter version               Print version

\x1b[1mSCAN OPTIONS\x1b[0m
  -c, --config <file>          YAML config file
  --out-dir <dir>              Report directory (default: reports)
  --format <fmt>               Output: json, html, both (default: both)
  --timeout <seconds>          Probe timeout, 1-120 (default: 8)
  --nmap-args=<args>           Arguments passed to nmap (default: "-sT -Pn --top-ports 1000 -sV")
  --no-nmap                    Skip the port scan
  --fail-on <severity>         Exit 1 if findings >= severity (high, medium, low)
  --concurrency <n>            Targets scanned at once (default: 4)

\x1b[1mEXAMPLES\x1b[0m
  reconnoiter scan example.com                        Scan one host
  reconnoiter scan example.com --no-nmap --format json
  reconnoiter scan --config reconnoiter.yml           Scan the configured targets
  reconnoiter scan 10.0.0.5 --fail-on high            CI gate on high findings

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  RECONNOITER_LOG_LEVEL        Log level: debug, info, warn, error, silent

Only scan systems you own or are authorised to test.

`);
}

function buildScanOptions(args: Record<string, string>, positional: string[], signal: AbortSignal): ScanOptions {
  let format: ScanOptions["format"];
  if (args["format"] !== undefined) {
    const parsed = ReportFormatSchema.safeParse(args["format"]);
    if (!parsed.success) throw new UsageError(`--format must be one of json, html, both`);
    format = parsed.data;
  }

  let failOn: Severity | undefined;
  const rawFailOn = args["fail-on"];
  if (rawFailOn !== undefined) {
    if (!isSeverity(rawFailOn)) throw new UsageError(`--fail-on must be one of high, medium, low`);
    failOn = rawFailOn;
  }

  return {
    target: positional[0],
    config: args["config"],
    outDir: args["out-dir"],
    format,
    timeout: intFlag(args, "timeout", 1, 120),
    nmapArgs: args["nmap-args"],
    noNmap: args["no-nmap"] === "true",
    failOn,
    concurrency: intFlag(args, "concurrency", 1, 64),
    signal,
  };
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`reconnoiter v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);

  switch (command) {
    case "version":
      process.stdout.write(`reconnoiter v${VERSION}\n`);
      return 0;

    case "policy":
      runPolicy(positional[0]);
      return 0;

    case "init":
      runInit({ path: positional[0] || "." });
      return 0;

    case "scan": {
      // First Ctrl-C cancels outstanding probes; reports are still written
      const controller = new AbortController();
      const onSigint = () => {
        process.stderr.write("[reconnoiter] Interrupted, finishing with partial results...\n");
        controller.abort();
        process.off("SIGINT", onSigint);
      };
      process.on("SIGINT", onSigint);
      try {
        return await runScan(buildScanOptions(args, positional, controller.signal));
      } finally {
        process.off("SIGINT", onSigint);
      }
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof UsageError || err instanceof ConfigError || err instanceof SettingsError) {
      process.stderr.write(`[reconnoiter] Error: ${message}\n`);
    } else {
      process.stderr.write(`[reconnoiter] Fatal: ${message}\n`);
    }
    process.exitCode = 1;
  },
);
