/**
 * Command-line argument parsing.
 */

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

const BOOLEAN_FLAGS = new Set(["help", "version", "no-nmap", "verbose", "quiet"]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "config", "out-dir", "format", "timeout", "nmap-args", "fail-on", "concurrency",
]);

/**
 * `--flag value` and `--flag=value` are both accepted. Flags whose value
 * starts with "-" (such as `--nmap-args "-sT -Pn"`) need the `=` form.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] ?? "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[reconnoiter] Warning: unknown flag --${key}\n`);
      }

      if (eq !== -1) {
        args[key] = arg.slice(eq + 1);
      } else if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          throw new UsageError(`--${key} requires a value`);
        }
        args[key] = value;
        i++;
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else if (key === "c") {
        const value = argv[++i];
        if (value === undefined) throw new UsageError(`-c requires a value`);
        args["config"] = value;
      } else {
        throw new UsageError(`unknown option -${key}`);
      }
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.RECONNOITER_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.RECONNOITER_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

/** Parse an integer flag in [min, max]; undefined when the flag is absent. */
export function intFlag(
  args: Record<string, string>,
  key: string,
  min: number,
  max: number,
): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw.trim()) || value < min || value > max) {
    throw new UsageError(`--${key} must be an integer between ${min} and ${max}`);
  }
  return value;
}
