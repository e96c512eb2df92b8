import http from "node:http";
import type { Socket } from "node:net";
import type pino from "pino";
import { WebSocketServer, WebSocket as NodeWebSocket } from "ws";
import { Relay, type RelayOptions } from "./relay.js";
import type { PeerConnection } from "./types.js";

export const DEFAULT_RELAY_PORT = 8765;
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

export interface NodeRelayServerConfig {
  port: number;
  host?: string;
  /** Only upgrade requests on this path. Any path is accepted when unset. */
  path?: string;
  maxFrameBytes?: number;
  logger: pino.Logger;
  relay?: Omit<RelayOptions, "logger">;
}

/**
 * Standalone Node.js relay server.
 *
 * Clients connect with a plain WebSocket:
 *   ws://host:8765/
 * The first frame they receive is `identity_assigned`. A `/health` HTTP
 * endpoint is served on the same port.
 */
export interface RelayServer {
  readonly relay: Relay;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Bound port; differs from the configured one when that was 0. */
  port(): number;
}

function bufferFromWsData(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;

  if (Array.isArray(data)) {
    return Buffer.concat(data.map(bufferFromWsData));
  }

  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }

  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  if (typeof data === "string") {
    return Buffer.from(data, "utf8");
  }

  return Buffer.from(String(data), "utf8");
}

function wrapSocket(ws: NodeWebSocket): PeerConnection {
  return {
    send(data) {
      return new Promise((resolve, reject) => {
        if (ws.readyState !== NodeWebSocket.OPEN) {
          reject(new Error(`WebSocket not open (readyState=${ws.readyState})`));
          return;
        }
        ws.send(data, (error) => {
          if (error) reject(error);
          else resolve();
        });
      });
    },
    close(code, reason) {
      if (ws.readyState === NodeWebSocket.CLOSED) return;
      ws.close(code, reason);
    },
    ping() {
      if (ws.readyState !== NodeWebSocket.OPEN) return;
      ws.ping();
    },
  };
}

export function createRelayServer(config: NodeRelayServerConfig): RelayServer {
  const { host = "0.0.0.0", path, logger } = config;
  const serverLogger = logger.child({ module: "node-adapter" });
  const relay = new Relay({ ...config.relay, logger });

  const httpServer = http.createServer((req, res) => {
    if (req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
      return;
    }
    res.writeHead(404);
    res.end("Not found");
  });

  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: config.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
  });

  httpServer.on("upgrade", (req, socket: Socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (path && url.pathname !== path) {
      socket.once("finish", () => socket.destroy());
      socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: NodeWebSocket) => {
    let id: string;
    try {
      id = relay.connect(wrapSocket(ws));
    } catch (error) {
      serverLogger.warn({ err: error }, "connection_rejected");
      return;
    }

    ws.on("message", (data) => {
      const text = bufferFromWsData(data).toString("utf8");
      relay.receive(id, text).catch((error: unknown) => {
        serverLogger.error({ id, err: error }, "frame_queue_failed");
      });
    });

    ws.on("pong", () => {
      relay.markAlive(id);
    });

    ws.on("close", (code) => {
      serverLogger.debug({ id, code }, "socket_closed");
      relay.disconnect(id, "closed");
    });

    ws.on("error", (error) => {
      serverLogger.warn({ id, err: error }, "socket_error");
      relay.disconnect(id, "transport_error");
    });
  });

  const boundPort = (): number => {
    const address = httpServer.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return config.port;
  };

  return {
    relay,
    port: boundPort,

    start() {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(config.port, host, () => {
          httpServer.off("error", reject);
          relay.start();
          serverLogger.info({ host, port: boundPort() }, "relay_listening");
          resolve();
        });
      });
    },

    stop() {
      return new Promise((resolve) => {
        relay.stop();
        for (const ws of wss.clients) {
          ws.terminate();
        }

        let finished = false;
        const finish = () => {
          if (finished) return;
          finished = true;
          serverLogger.info("relay_stopped");
          resolve();
        };

        const timeout = setTimeout(() => finish(), 1500);
        wss.close(() => {
          httpServer.close(() => {
            clearTimeout(timeout);
            finish();
          });
          httpServer.closeAllConnections();
        });
      });
    },
  };
}
