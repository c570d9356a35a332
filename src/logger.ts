import { pino, type Logger } from "pino";

export type { Logger };

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export function resolveLogLevel(input?: string): string {
  const level = (input ?? "info").toLowerCase();
  return LEVELS.has(level) ? level : "info";
}

export function createLogger(name: string, level = process.env.TASKMESH_LOG_LEVEL): Logger {
  return pino({ name, level: resolveLogLevel(level) });
}
