import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import { DEFAULT_NMAP_ARGS, DEFAULT_OUT_DIR, DEFAULT_TIMEOUT } from "@reconnoiter/engine";

export interface InitOptions {
  path: string;
}

export const CONFIG_FILE_NAME = "reconnoiter.yml";

export function generateConfig(): string {
  return `# reconnoiter configuration
# Values given on the command line take precedence over this file.

# Hosts or IPs to scan. A target passed on the command line is scanned first.
targets: []

# Seconds, 1-120. The port scan gets max(timeout * 4, 20).
timeout: ${DEFAULT_TIMEOUT}

nmap_args: "${DEFAULT_NMAP_ARGS}"

scanners:
  dns: true
  http: true
  tls: true
  nmap: true

output:
  format: both        # json, html or both
  out_dir: ${DEFAULT_OUT_DIR}

# Per-probe timeouts (seconds); default to \`timeout\`.
# timeouts:
#   http:
#     timeout: 5
#   tls:
#     timeout: 5
`;
}

/** Returns true when the file was created, false when one already existed. */
export function runInit(options: InitOptions): boolean {
  const dir = resolve(options.path);

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new Error(`${dir} is not a directory`);
  }

  const configFile = join(dir, CONFIG_FILE_NAME);
  process.stdout.write("\n\x1b[36mreconnoiter init\x1b[0m\n\n");

  if (existsSync(configFile)) {
    process.stdout.write("\x1b[33mSkipped (already exists):\x1b[0m\n");
    process.stdout.write(`  ~ ${CONFIG_FILE_NAME}\n\n`);
    return false;
  }

  writeFileSync(configFile, generateConfig());
  process.stdout.write("\x1b[32mCreated:\x1b[0m\n");
  process.stdout.write(`  + ${CONFIG_FILE_NAME}\n\n`);
  return true;
}
