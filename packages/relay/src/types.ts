/**
 * Relay connection types and interfaces.
 *
 * The relay brokers frames between anonymous clients, each holding one
 * WebSocket connection and one ephemeral identity. Payloads are forwarded
 * without modification.
 */

export type Identity = string;

export interface PeerConnection {
  /** Resolves once the frame has been flushed to the transport. */
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
  /** Transport-level liveness probe, where the transport has one. */
  ping?(): void;
}

export interface RegisteredSession {
  id: Identity;
  connection: PeerConnection;
  publicKeyBlob: string | null;
  connectedAt: number;
  lastSeenAt: number;
}

/**
 * `connecting` until `identity_assigned` is flushed, `registered` until the
 * first client frame, then `active` until `closed`.
 */
export type SessionState = "connecting" | "registered" | "active" | "closed";

export type DisconnectReason = "closed" | "heartbeat_timeout" | "transport_error" | "shutdown";

export interface RelayEvents {
  onSessionCreated?(id: Identity): void;
  onSessionClosed?(id: Identity, reason: DisconnectReason): void;
  onError?(id: Identity, error: Error): void;
}
