import type pino from "pino";
import { encodeServerFrame } from "./protocol.js";
import type { ConnectionRegistry } from "./connection-registry.js";
import type { Identity } from "./types.js";

export type HeartbeatOptions = {
  intervalMs: number;
  timeoutMs: number;
};

export const DEFAULT_HEARTBEAT: HeartbeatOptions = {
  intervalMs: 15_000,
  timeoutMs: 45_000,
};

type HeartbeatMonitorOptions = HeartbeatOptions & {
  registry: Pick<ConnectionRegistry, "list">;
  onTimeout: (id: Identity) => void;
  logger: pino.Logger;
  now?: () => number;
};

const PING_FRAME = encodeServerFrame({ type: "ping" });

/**
 * Probes every registered connection on a fixed interval and tears down the
 * ones that stayed silent for longer than the timeout.
 */
export class HeartbeatMonitor {
  private readonly options: HeartbeatMonitorOptions;
  private readonly now: () => number;
  private readonly logger: pino.Logger;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: HeartbeatMonitorOptions) {
    if (options.timeoutMs < options.intervalMs) {
      throw new Error("Heartbeat timeout must not be shorter than the interval");
    }
    this.options = options;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger.child({ module: "heartbeat" });
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  sweep(): void {
    const now = this.now();
    for (const session of this.options.registry.list()) {
      const silentMs = now - session.lastSeenAt;
      if (silentMs > this.options.timeoutMs) {
        this.logger.info({ id: session.id, silentMs }, "heartbeat_timeout");
        this.options.onTimeout(session.id);
        continue;
      }

      session.connection.send(PING_FRAME).catch((error: unknown) => {
        this.logger.debug({ id: session.id, err: error }, "heartbeat_probe_failed");
      });
      session.connection.ping?.();
    }
  }
}
