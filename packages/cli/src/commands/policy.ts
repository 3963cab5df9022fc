import { getPolicy } from "@reconnoiter/engine";
import { formatPolicy } from "../formatter.js";

export function runPolicy(kind?: string): void {
  const rules = kind === "port" || kind === "header" ? getPolicy(kind) : getPolicy();
  process.stdout.write(formatPolicy(rules, { noColor: !process.stdout.isTTY }));
}
