/**
 * CLI configuration
 */

import { Command } from "commander";
import { createResolveCommand } from "./commands/resolve.js";
import { readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("aws-domain-roles")
    .description("Resolve per-domain AWS credentials for DNS providers")
    .version(getVersion());

  program.addCommand(createResolveCommand());

  return program;
}
