/**
 * Filesystem layout: ~/.crewline for user state, <project>/.crewline for overrides
 */

import { homedir } from "node:os";
import { join, dirname } from "node:path";
import { existsSync, mkdirSync } from "node:fs";

const CREWLINE_HOME = join(homedir(), ".crewline");

export function getCrewlineHome(): string {
  return process.env["CREWLINE_HOME"] ?? CREWLINE_HOME;
}

export function getConfigPath(): string {
  return join(getCrewlineHome(), "config.json");
}

export function getDatabasePath(): string {
  return join(getCrewlineHome(), "db", "crewline.db");
}

export function getProjectConfigPath(projectRoot: string): string {
  return join(projectRoot, ".crewline", "config.json");
}

// ── Socket paths ─────────────────────────────────────────────────────────

export function getSocketPath(name: string): string {
  const tmpDir = process.env["TMPDIR"] ?? "/tmp";
  return join(tmpDir, `crewline-${process.getuid?.() ?? "user"}`, `${name}.sock`);
}

// ── Directory Initialization ─────────────────────────────────────────────

export function ensureDirectory(dirPath: string, mode?: number): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: mode ?? 0o755 });
  }
}

export function ensureSecureDirectory(dirPath: string): void {
  ensureDirectory(dirPath, 0o700);
}

// ── Project Root Detection ───────────────────────────────────────────────

export function findProjectRoot(startDir?: string): string {
  let currentDir = startDir ?? process.cwd();

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, ".git"))) {
      return currentDir;
    }
    if (existsSync(join(currentDir, ".crewline"))) {
      return currentDir;
    }
    if (existsSync(join(currentDir, "package.json"))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}
