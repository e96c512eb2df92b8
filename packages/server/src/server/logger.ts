import pino from "pino";
import type { PersistedConfig } from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return value === "pretty" || value === "json" ? value : undefined;
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const level: LogLevel =
    parseLogLevel(env.CIPHERPOST_LOG) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    parseLogFormat(env.CIPHERPOST_LOG_FORMAT) ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined
): pino.Logger {
  const config = resolveLogConfig(persistedConfig);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    level: config.level,
    transport,
  });
}
