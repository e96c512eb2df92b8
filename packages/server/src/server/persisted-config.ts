import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
const LogFormatSchema = z.enum(["pretty", "json"]);

export const PersistedConfigSchema = z
  .object({
    listen: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        path: z.string().startsWith("/").optional(),
      })
      .strict()
      .optional(),
    heartbeat: z
      .object({
        intervalMs: z.number().int().positive().optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .refine(
        (value) =>
          value.intervalMs === undefined ||
          value.timeoutMs === undefined ||
          value.timeoutMs >= value.intervalMs,
        { message: "timeoutMs must be at least intervalMs" }
      )
      .optional(),
    limits: z
      .object({
        maxFrameBytes: z.number().int().positive().optional(),
        maxBlobLength: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        level: LogLevelSchema.optional(),
        format: LogFormatSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

export const CONFIG_FILE_NAME = "config.json";

export class PersistedConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = "PersistedConfigError";
  }
}

/**
 * Read `<home>/config.json`. A missing file is an empty config; an invalid
 * one is an error, so a typo never silently falls back to defaults.
 */
export function loadPersistedConfig(home: string): PersistedConfig {
  const configPath = path.join(home, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistedConfigError(`Failed to read ${configPath}: ${reason}`, configPath);
  }

  const result = PersistedConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new PersistedConfigError(`Invalid ${configPath}: ${issues}`, configPath);
  }
  return result.data;
}
