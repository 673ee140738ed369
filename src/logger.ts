/**
 * Structured logging with pino.
 *
 * Logs go to stderr: stdout carries the MCP stdio transport and must contain
 * nothing but protocol frames.
 */
import pino from "pino";
import type { Logger } from "pino";
import { loadConfig } from "./config.js";

export type { Logger };

const VALID_LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.trim().toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : "info";
}

export function createLogger(level?: string): Logger {
  return pino(
    {
      level: resolveLogLevel(level),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      base: {
        service: "docs-graph-mcp",
      },
    },
    pino.destination(2),
  );
}

/** Default logger for components built without one. */
export const logger = createLogger(loadConfig().logLevel);
