import os from "node:os";
import path from "node:path";
import { mkdirSync } from "node:fs";
import { z } from "zod";

import { DEFAULT_HEARTBEAT, DEFAULT_MAX_BLOB_LENGTH } from "@cipherpost/relay";
import { DEFAULT_MAX_FRAME_BYTES, DEFAULT_RELAY_PORT } from "@cipherpost/relay/node";
import type { RelayDaemonConfig } from "./bootstrap.js";
import { loadPersistedConfig, type PersistedConfig } from "./persisted-config.js";

function expandHomeDir(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  if (input === "~") {
    return os.homedir();
  }
  return input;
}

export function readCipherpostHomeFromEnv(
  env: NodeJS.ProcessEnv = process.env
): string {
  const raw = env.CIPHERPOST_HOME ?? "~/.cipherpost";
  const expanded = path.resolve(expandHomeDir(raw));
  mkdirSync(expanded, { recursive: true });
  return expanded;
}

function readIntFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function readRelayPortFromEnv(
  env: NodeJS.ProcessEnv = process.env
): number | undefined {
  return readIntFromEnv(env.CIPHERPOST_PORT ?? env.PORT);
}

const RelayDaemonConfigSchema: z.ZodType<RelayDaemonConfig> = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  path: z.string().startsWith("/").optional(),
  heartbeat: z
    .object({
      intervalMs: z.number().int().positive(),
      timeoutMs: z.number().int().positive(),
    })
    .refine((value) => value.timeoutMs >= value.intervalMs, {
      message: "must be at least heartbeat.intervalMs",
      path: ["timeoutMs"],
    }),
  maxFrameBytes: z.number().int().positive(),
  maxBlobLength: z.number().int().positive(),
});

export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

/** Env, file and flag values all pass through here before the daemon sees them. */
function validateDaemonConfig(config: RelayDaemonConfig): RelayDaemonConfig {
  const result = RelayDaemonConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid relay configuration: ${issues}`);
  }
  return result.data;
}

function resolveRelayDaemonConfig(
  persisted: PersistedConfig,
  env: NodeJS.ProcessEnv
): RelayDaemonConfig {
  const intervalMs =
    readIntFromEnv(env.CIPHERPOST_HEARTBEAT_INTERVAL_MS) ??
    persisted.heartbeat?.intervalMs ??
    DEFAULT_HEARTBEAT.intervalMs;
  const timeoutMs =
    readIntFromEnv(env.CIPHERPOST_HEARTBEAT_TIMEOUT_MS) ??
    persisted.heartbeat?.timeoutMs ??
    Math.max(DEFAULT_HEARTBEAT.timeoutMs, intervalMs);

  return {
    host: env.CIPHERPOST_HOST ?? persisted.listen?.host ?? "0.0.0.0",
    port: readRelayPortFromEnv(env) ?? persisted.listen?.port ?? DEFAULT_RELAY_PORT,
    path: env.CIPHERPOST_PATH ?? persisted.listen?.path,
    heartbeat: { intervalMs, timeoutMs },
    maxFrameBytes: persisted.limits?.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
    maxBlobLength: persisted.limits?.maxBlobLength ?? DEFAULT_MAX_BLOB_LENGTH,
  };
}

/**
 * Resolve the daemon config. Precedence: environment, then
 * `$CIPHERPOST_HOME/config.json`, then built-in defaults.
 */
export function buildRelayDaemonConfig(
  persisted: PersistedConfig,
  env: NodeJS.ProcessEnv = process.env
): RelayDaemonConfig {
  return validateDaemonConfig(resolveRelayDaemonConfig(persisted, env));
}

export type CliConfigOverrides = {
  host?: string;
  port?: number;
  path?: string;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
};

/** Command-line flags win over everything `buildRelayDaemonConfig` resolves. */
export function loadConfig(
  home: string,
  options: { env?: NodeJS.ProcessEnv; overrides?: CliConfigOverrides } = {}
): RelayDaemonConfig {
  const base = resolveRelayDaemonConfig(loadPersistedConfig(home), options.env ?? process.env);
  const overrides = options.overrides ?? {};

  const intervalMs = overrides.heartbeatIntervalMs ?? base.heartbeat.intervalMs;
  const timeoutMs =
    overrides.heartbeatTimeoutMs ?? Math.max(base.heartbeat.timeoutMs, intervalMs);

  return validateDaemonConfig({
    ...base,
    host: overrides.host ?? base.host,
    port: overrides.port ?? base.port,
    path: overrides.path ?? base.path,
    heartbeat: { intervalMs, timeoutMs },
  });
}
