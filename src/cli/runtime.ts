/**
 * Helpers shared by CLI commands: configuration, documents, bus secret.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigStore } from "../storage/config-store.js";
import { InvalidConfigError, ValidationError } from "../types/errors.js";
import type { ICoordinatorConfig } from "../types/config.js";
import { findProjectRoot, getSocketPath } from "../utils/pathResolver.js";

export const SECRET_ENV = "CREWLINE_BUS_SECRET";

/** Global config merged under the project's, if any. */
export function loadConfig(projectRoot?: string): ICoordinatorConfig {
  const store = new ConfigStore();
  store.loadGlobal();
  return store.loadProject(projectRoot ?? findProjectRoot());
}

/** Read a JSON or YAML file. YAML is a superset of JSON, so one parser serves both. */
export async function readDocument(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  try {
    return parseYaml(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`file ${filePath}`, [reason]);
  }
}

export function resolveSocketPath(config: ICoordinatorConfig): string {
  return config.transport.socketPath ?? getSocketPath("bus");
}

export function requireSecret(config: ICoordinatorConfig): string {
  const secret = process.env[SECRET_ENV] ?? config.transport.secret;
  if (secret === undefined || secret.length === 0) {
    throw new InvalidConfigError("transport.secret", `not set; set it in the config file or ${SECRET_ENV}`);
  }
  return secret;
}
