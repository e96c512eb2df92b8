import type { Logger } from "pino";
import type { HeartbeatOptions } from "@cipherpost/relay";
import { createRelayServer, type RelayServer } from "@cipherpost/relay/node";

export type RelayDaemonConfig = {
  host: string;
  port: number;
  path?: string;
  heartbeat: HeartbeatOptions;
  maxFrameBytes: number;
  maxBlobLength: number;
};

export type RelayDaemon = {
  config: RelayDaemonConfig;
  server: RelayServer;
  start(): Promise<void>;
  close(): Promise<void>;
};

export function createRelayDaemon(config: RelayDaemonConfig, logger: Logger): RelayDaemon {
  const daemonLogger = logger.child({ module: "daemon" });

  const server = createRelayServer({
    host: config.host,
    port: config.port,
    path: config.path,
    maxFrameBytes: config.maxFrameBytes,
    logger,
    relay: {
      heartbeat: config.heartbeat,
      maxBlobLength: config.maxBlobLength,
      events: {
        onSessionCreated: (id) => daemonLogger.debug({ id }, "session_created"),
        onSessionClosed: (id, reason) => daemonLogger.debug({ id, reason }, "session_ended"),
        onError: (id, error) => daemonLogger.error({ id, err: error }, "session_error"),
      },
    },
  });

  let started = false;

  return {
    config,
    server,
    async start() {
      if (started) return;
      await server.start();
      started = true;
      daemonLogger.info(
        { host: config.host, port: server.port(), heartbeat: config.heartbeat },
        "daemon_started"
      );
    },
    async close() {
      if (!started) return;
      started = false;
      await server.stop();
      daemonLogger.info("daemon_stopped");
    },
  };
}
