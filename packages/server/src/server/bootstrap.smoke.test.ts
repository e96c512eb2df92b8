import pino from "pino";
import { describe, expect, test } from "vitest";

import { createRelayDaemon } from "./bootstrap.js";

describe("relay daemon bootstrap", () => {
  test("starts, serves the health endpoint and stops", async () => {
    const daemon = createRelayDaemon(
      {
        host: "127.0.0.1",
        port: 0,
        heartbeat: { intervalMs: 1_000, timeoutMs: 3_000 },
        maxFrameBytes: 4096,
        maxBlobLength: 2048,
      },
      pino({ level: "silent" })
    );

    await daemon.start();
    try {
      const response = await fetch(`http://127.0.0.1:${daemon.server.port()}/health`);
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "ok" });
    } finally {
      await daemon.close();
    }
  });
});
