import pino from "pino";
import type { PeerConnection } from "../types.js";

export class MockConnection implements PeerConnection {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  pings = 0;
  failSends = false;
  /** Sends never settle, like a socket whose buffer stopped draining. */
  stallSends = false;

  send(data: string): Promise<void> {
    if (this.failSends) {
      return Promise.reject(new Error("socket gone"));
    }
    if (this.stallSends) {
      return new Promise<void>(() => {});
    }
    this.sent.push(data);
    return Promise.resolve();
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  ping(): void {
    this.pings++;
  }

  frames(): unknown[] {
    return this.sent.map((raw): unknown => JSON.parse(raw));
  }

  framesOfType(type: string): unknown[] {
    return this.frames().filter(
      (frame) => typeof frame === "object" && frame !== null && Reflect.get(frame, "type") === type
    );
  }

  lastFrame(): unknown {
    const raw = this.sent[this.sent.length - 1];
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
