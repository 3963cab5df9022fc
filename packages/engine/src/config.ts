/**
 * Config loader — reads and validates a YAML scan configuration file and
 * merges it with command-line values (CLI > file > defaults).
 * Uses Zod for schema validation.
 */

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ReportFormatSchema, type ReportFormat, type ScanSettings } from "./schemas.js";
import { DEFAULT_NMAP_ARGS } from "./probes/nmap.js";
import { logger } from "./logger.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const positiveSeconds = z
  .number({ invalid_type_error: "timeout must be a positive integer" })
  .int("timeout must be a positive integer")
  .min(1, "timeout must be a positive integer");

const timeoutNodeSchema = z
  .object({ timeout: positiveSeconds.optional() })
  .nullable()
  .optional();

const rawConfigSchema = z
  .object({
    targets: z
      .array(z.string().min(1, "targets must be non-empty strings"))
      .optional(),
    timeout: positiveSeconds.max(120, "timeout must be at most 120 seconds").optional(),
    nmap_args: z.string().optional(),
    scanners: z
      .object({
        dns: z.boolean().optional(),
        http: z.boolean().optional(),
        tls: z.boolean().optional(),
        nmap: z.boolean().optional(),
      })
      .strict()
      .nullable()
      .optional(),
    output: z
      .object({
        format: ReportFormatSchema.optional(),
        out_dir: z.string().optional(),
      })
      .nullable()
      .optional(),
    timeouts: z
      .object({
        http: timeoutNodeSchema,
        tls: timeoutNodeSchema,
      })
      .nullable()
      .optional(),
  })
  .passthrough();

export type RawConfig = z.infer<typeof rawConfigSchema>;

const KNOWN_KEYS = new Set(["targets", "timeout", "nmap_args", "scanners", "output", "timeouts"]);

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

/** Values given on the command line; undefined means "not given". */
export interface CliOverrides {
  outDir?: string;
  format?: ReportFormat;
  timeout?: number;
  nmapArgs?: string;
  noNmap?: boolean;
}

export interface RuntimeConfig {
  targets: string[];
  outDir: string;
  format: ReportFormat;
  settings: ScanSettings;
}

export const DEFAULT_TIMEOUT = 8;
export const DEFAULT_OUT_DIR = "reports";
export const DEFAULT_FORMAT: ReportFormat = "both";

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

/**
 * Load and validate a YAML config file. An empty file is an empty config.
 * Throws ConfigError for anything that cannot be used.
 */
export function loadConfig(path: string): RawConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") throw new ConfigError(`Config file not found: ${path}`);
    throw new ConfigError(`Could not read config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError("Config root must be a mapping/object");
  }

  const result = rawConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`Invalid config ${path}: ${issues.join("; ")}`);
  }

  for (const key of Object.keys(result.data)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Warning: unknown config key '${key}'`);
    }
  }

  return result.data;
}

/* ------------------------------------------------------------------ */
/*  Precedence                                                         */
/* ------------------------------------------------------------------ */

/**
 * Merge the command-line target and overrides with a loaded config.
 *
 * Targets: the command-line target first, then config targets not already
 * listed. Throws ConfigError when no target is left.
 */
export function resolveRuntimeConfig(
  target: string | undefined,
  raw: RawConfig,
  cli: CliOverrides = {},
): RuntimeConfig {
  const configTargets = raw.targets ?? [];
  const targets = [...new Set(target ? [target, ...configTargets] : configTargets)];
  if (targets.length === 0) {
    throw new ConfigError("No target given. Pass a target or list targets in the config file.");
  }

  const timeout = cli.timeout ?? raw.timeout ?? DEFAULT_TIMEOUT;
  const scanners = raw.scanners ?? {};

  return {
    targets,
    outDir: cli.outDir || raw.output?.out_dir || DEFAULT_OUT_DIR,
    format: cli.format ?? raw.output?.format ?? DEFAULT_FORMAT,
    settings: {
      timeout,
      httpTimeout: raw.timeouts?.http?.timeout ?? timeout,
      tlsTimeout: raw.timeouts?.tls?.timeout ?? timeout,
      nmapArgs: cli.nmapArgs || raw.nmap_args || DEFAULT_NMAP_ARGS,
      dns: scanners.dns ?? true,
      http: scanners.http ?? true,
      tls: scanners.tls ?? true,
      nmap: (scanners.nmap ?? true) && !cli.noNmap,
    },
  };
}
