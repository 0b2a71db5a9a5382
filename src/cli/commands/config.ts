/**
 * Config command - Show the configuration search path
 */

import { existsSync } from "node:fs";
import chalk from "chalk";
import { configSearchPath } from "../../settings/resolver";

export function configCommand(source?: string): void {
  const files = configSearchPath(source ? { kind: "path", path: source } : null);

  console.log("Configuration files, lowest precedence first:");
  for (const file of files) {
    const marker = existsSync(file) ? chalk.green("✔") : chalk.dim("·");
    console.log(`  ${marker} ${file}`);
  }
  console.log("\nEach file holds one \"name: value\" setting per line.");
  console.log("Run \"docpress settings\" for the recognized names.");
}
