import pino from "pino";
import type { PluginLogger } from "../types.js";

/**
 * Fallback logger for hosts that do not hand the plugin a logger of their own.
 */
export function createLogger(name: string): PluginLogger {
  const log = pino({ name, level: process.env.LOG_LEVEL || "info" });
  return {
    debug: (message) => log.debug(message),
    info: (message) => log.info(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
