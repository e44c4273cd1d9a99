/**
 * Structured logging via pino with credential redaction
 */

import pino from "pino";
import { homedir } from "node:os";
import { join } from "node:path";

const LOG_DIR = join(process.env["CREWLINE_HOME"] ?? join(homedir(), ".crewline"), "logs");

const REDACT_PATHS = [
  "apiKey",
  "secret",
  "token",
  "authorization",
  "password",
  "*.apiKey",
  "*.secret",
  "*.token",
  "*.authorization",
  "*.password",
  "providers.*.apiKey",
  "transport.secret",
];

const logger = pino({
  name: "crewline",
  level: process.env["CREWLINE_LOG_LEVEL"] ?? "error",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  ...(process.env["NODE_ENV"] === "development"
    ? {
        transport: {
          target: "pino/file",
          options: { destination: join(LOG_DIR, "crewline.log"), mkdir: true },
        },
      }
    : {}),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export { logger };
