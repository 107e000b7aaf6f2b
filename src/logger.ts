import type { Logger } from "pino";
import pino from "pino";

export type { Logger } from "pino";

/**
 * Pino logger factory - JSON to stdout, silenced under test tooling.
 * Level comes from TOOL_ADAPTER_LOG_LEVEL (default: info).
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.TOOL_ADAPTER_LOG_LEVEL ?? "info";

  return pino({
    level,
    enabled: !(isVitest || nodeEnv === "test"),
    base: { ...bindings, app: "tool-source-adapter" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
