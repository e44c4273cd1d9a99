/**
 * `crewline config`: inspect the merged configuration.
 */

import { Command } from "commander";
import pc from "picocolors";
import type { ICoordinatorConfig } from "../../types/config.js";
import { getConfigPath, getProjectConfigPath, findProjectRoot } from "../../utils/pathResolver.js";
import { loadConfig } from "../runtime.js";

/** The config with secrets masked, ready to print. */
export function redactConfig(config: ICoordinatorConfig): ICoordinatorConfig {
  return {
    ...config,
    transport: {
      ...config.transport,
      secret: config.transport.secret === undefined ? undefined : "[REDACTED]",
    },
  };
}

export function getNestedValue(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const key of path.split(".")) {
    if (current === null || typeof current !== "object" || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

export function createConfigCommand(): Command {
  const config = new Command("config").description("Configuration inspection");

  config
    .command("show [key]")
    .description("Print the merged configuration (or one dotted key)")
    .option("--project-root <path>", "Override project root detection")
    .action((key: string | undefined, options: { projectRoot?: string | undefined }) => {
      const merged = redactConfig(loadConfig(options.projectRoot));
      if (key === undefined) {
        process.stdout.write(`${JSON.stringify(merged, null, 2)}\n`);
        return;
      }

      const value = getNestedValue(merged, key);
      if (value === undefined) {
        process.stderr.write(pc.red(`Configuration key not found: ${key}\n`));
        process.exitCode = 1;
        return;
      }
      process.stdout.write(`${key} = ${JSON.stringify(value, null, 2)}\n`);
    });

  config
    .command("path")
    .description("Print where configuration is read from")
    .option("--project-root <path>", "Override project root detection")
    .action((options: { projectRoot?: string | undefined }) => {
      process.stdout.write(`global:  ${getConfigPath()}\n`);
      process.stdout.write(`project: ${getProjectConfigPath(options.projectRoot ?? findProjectRoot())}\n`);
    });

  return config;
}
