import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = typeof LOG_LEVELS[number];

function resolveLogLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === candidate) ?? "info";
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: {
    system: "rebound"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to a single tool run.
 */
export function getToolLogger(tool: string, target: string) {
  return logger.child({
    tool,
    target
  });
}
