import { describe, expect, test } from "vitest";

import { resolveLogConfig } from "./logger.js";

describe("resolveLogConfig", () => {
  test("defaults to info and pretty output", () => {
    expect(resolveLogConfig(undefined, {})).toEqual({ level: "info", format: "pretty" });
  });

  test("uses the persisted log settings", () => {
    expect(resolveLogConfig({ log: { level: "warn", format: "json" } }, {})).toEqual({
      level: "warn",
      format: "json",
    });
  });

  test("lets the environment override the persisted settings", () => {
    expect(
      resolveLogConfig(
        { log: { level: "warn", format: "pretty" } },
        { CIPHERPOST_LOG: "debug", CIPHERPOST_LOG_FORMAT: "json" }
      )
    ).toEqual({ level: "debug", format: "json" });
  });

  test("ignores unrecognised environment values", () => {
    expect(resolveLogConfig(undefined, { CIPHERPOST_LOG: "loud" })).toEqual({
      level: "info",
      format: "pretty",
    });
  });
});
