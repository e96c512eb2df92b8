import type pino from "pino";
import { ConnectionRegistry } from "./connection-registry.js";
import { RelayError, isRelayError } from "./errors.js";
import { FriendStore } from "./friend-store.js";
import { DEFAULT_HEARTBEAT, HeartbeatMonitor, type HeartbeatOptions } from "./heartbeat.js";
import { IdentityAllocator } from "./identity-allocator.js";
import { MessageRouter } from "./message-router.js";
import {
  encodeServerFrame,
  parseClientFrame,
  type ClientFrame,
  type FriendSummary,
  type ServerFrame,
} from "./protocol.js";
import type {
  DisconnectReason,
  Identity,
  PeerConnection,
  RelayEvents,
  SessionState,
} from "./types.js";

export const DEFAULT_MAX_BLOB_LENGTH = 512 * 1024;

export type RelayOptions = {
  logger: pino.Logger;
  registry?: ConnectionRegistry;
  friends?: FriendStore;
  allocator?: IdentityAllocator;
  router?: MessageRouter;
  /** Pass `false` to drive liveness manually (tests, embedded use). */
  heartbeat?: Partial<HeartbeatOptions> | false;
  events?: RelayEvents;
  maxBlobLength?: number;
  now?: () => number;
  /** Random source for the default allocator. */
  randomIndex?: (max: number) => number;
};

type PeerSession = {
  id: Identity;
  state: SessionState;
  /** Tail of this connection's inbound frame queue. */
  inbound: Promise<void>;
  /** Tail of the frames waiting to be flushed to this connection. */
  outbox: Promise<void>;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled frame: ${JSON.stringify(value)}`);
}

/**
 * Protocol dispatcher for the relay.
 *
 * Owns per-connection state and is the only caller of the registries. Frames
 * from one connection run strictly in order. A handler awaits the flush of
 * its own replies only; frames for other connections go onto their outbox,
 * so a peer that stops draining never stalls anyone else.
 * Transport-agnostic: anything implementing PeerConnection can attach.
 */
export class Relay {
  readonly registry: ConnectionRegistry;
  readonly friends: FriendStore;
  private readonly allocator: IdentityAllocator;
  private readonly router: MessageRouter;
  private readonly heartbeat: HeartbeatMonitor | null;
  private readonly peers = new Map<Identity, PeerSession>();
  private readonly events: RelayEvents;
  private readonly logger: pino.Logger;
  private readonly maxBlobLength: number;
  private readonly now: () => number;

  constructor(options: RelayOptions) {
    const now = options.now ?? (() => Date.now());
    const registry = options.registry ?? new ConnectionRegistry({ now });
    const friends = options.friends ?? new FriendStore(registry);

    this.now = now;
    this.registry = registry;
    this.friends = friends;
    this.allocator =
      options.allocator ??
      new IdentityAllocator({
        isTaken: (id) => registry.isLive(id) || friends.isRetained(id),
        takenCount: () => registry.size + friends.retainedCount,
        randomIndex: options.randomIndex,
      });
    this.router =
      options.router ??
      new MessageRouter({
        registry,
        friends,
        now,
        forward: (to, frame) => this.forward(to, frame),
      });
    this.events = options.events ?? {};
    this.logger = options.logger.child({ module: "relay" });
    this.maxBlobLength = options.maxBlobLength ?? DEFAULT_MAX_BLOB_LENGTH;
    this.heartbeat =
      options.heartbeat === false
        ? null
        : new HeartbeatMonitor({
            ...DEFAULT_HEARTBEAT,
            ...options.heartbeat,
            registry,
            logger: options.logger,
            now,
            onTimeout: (id) => {
              this.disconnect(id, "heartbeat_timeout");
            },
          });
  }

  start(): void {
    this.heartbeat?.start();
  }

  /** Stops probing and closes every live session. */
  stop(): void {
    this.heartbeat?.stop();
    for (const id of Array.from(this.peers.keys())) {
      this.disconnect(id, "shutdown");
    }
  }

  /**
   * Attach a new connection: allocate an identity, register it and queue the
   * `identity_assigned` frame ahead of anything the client sends. The session
   * stays `connecting` until that frame is flushed.
   */
  connect(connection: PeerConnection): Identity {
    let id: Identity;
    try {
      id = this.allocator.allocate();
    } catch (error) {
      this.logger.warn({ err: error }, "identity_allocation_failed");
      connection.close(1013, "No identities available");
      throw error;
    }

    this.registry.register(id, connection);
    const peer: PeerSession = {
      id,
      state: "connecting",
      inbound: Promise.resolve(),
      outbox: Promise.resolve(),
    };
    this.peers.set(id, peer);
    this.logger.info({ id, sessions: this.registry.size }, "session_registered");
    this.events.onSessionCreated?.(id);

    peer.inbound = this.push(peer, { type: "identity_assigned", id }).then((sent) => {
      if (sent && peer.state === "connecting") {
        peer.state = "registered";
      }
    });
    return id;
  }

  /** Queue one inbound frame. Resolves once it (and every earlier frame) is handled. */
  receive(id: Identity, raw: string): Promise<void> {
    const peer = this.peers.get(id);
    if (!peer || peer.state === "closed") {
      return Promise.resolve();
    }
    this.registry.touch(id);
    peer.inbound = peer.inbound.then(() => this.handleFrame(peer, raw));
    return peer.inbound;
  }

  /** Transport-level liveness signal (e.g. a WebSocket pong). */
  markAlive(id: Identity): void {
    this.registry.touch(id);
  }

  /**
   * Tear down a session. Idempotent: close events and heartbeat timeouts may
   * both land here for the same identity.
   */
  disconnect(id: Identity, reason: DisconnectReason): boolean {
    const peer = this.peers.get(id);
    if (!peer || peer.state === "closed") {
      return false;
    }

    const session = this.registry.get(id);
    peer.state = "closed";
    this.peers.delete(id);
    this.registry.unregister(id);
    this.friends.removeIdentity(id);
    this.logger.info(
      {
        id,
        reason,
        durationMs: session ? this.now() - session.connectedAt : null,
        sessions: this.registry.size,
      },
      "session_closed"
    );

    if (reason === "heartbeat_timeout") {
      session?.connection.close(4000, "Heartbeat timeout");
    } else if (reason === "shutdown") {
      session?.connection.close(1001, "Server shutting down");
    }

    this.events.onSessionClosed?.(id, reason);
    return true;
  }

  getSessionState(id: Identity): SessionState {
    return this.peers.get(id)?.state ?? "closed";
  }

  get sessionCount(): number {
    return this.peers.size;
  }

  private async handleFrame(peer: PeerSession, raw: string): Promise<void> {
    if (peer.state === "closed") return;
    if (peer.state === "registered") {
      peer.state = "active";
    }

    let frame: ClientFrame;
    try {
      frame = parseClientFrame(raw, { maxBlobLength: this.maxBlobLength });
    } catch (error) {
      const relayError = isRelayError(error)
        ? error
        : new RelayError("MalformedFrame", "Frame could not be decoded");
      this.logger.warn({ id: peer.id, code: relayError.code }, "frame_rejected");
      await this.sendError(peer, relayError);
      return;
    }

    try {
      await this.dispatch(peer, frame);
    } catch (error) {
      if (isRelayError(error)) {
        this.logger.info({ id: peer.id, type: frame.type, code: error.code }, "request_failed");
        await this.sendError(peer, error);
        return;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ id: peer.id, type: frame.type, err }, "frame_handler_failed");
      this.events.onError?.(peer.id, err);
      await this.sendError(peer, new RelayError("InternalError", "Internal relay error"));
    }
  }

  private async dispatch(peer: PeerSession, frame: ClientFrame): Promise<void> {
    switch (frame.type) {
      case "register_key": {
        this.registry.setPublicKey(peer.id, frame.public_key_blob);
        await this.reply(peer, { type: "key_registered" });
        return;
      }

      case "friend_request": {
        const { created } = this.friends.request(peer.id, frame.to_id);
        if (created) {
          this.logger.info({ from: peer.id, to: frame.to_id }, "friend_request_created");
          this.forward(frame.to_id, {
            type: "friend_request_incoming",
            from_id: peer.id,
            public_key_blob: this.registry.publicKeyOf(peer.id),
          });
        }
        await this.reply(peer, { type: "friend_request_sent", to_id: frame.to_id });
        return;
      }

      case "friend_response": {
        const requester = frame.from_id;
        const { accepted } = this.friends.respond(peer.id, requester, frame.accept);
        this.logger.info({ responder: peer.id, requester, accepted }, "friend_request_settled");
        this.forward(requester, {
          type: "friend_response_result",
          peer_id: peer.id,
          accepted,
          public_key_blob: accepted ? this.registry.publicKeyOf(peer.id) : null,
        });
        if (accepted) {
          await this.reply(peer, {
            type: "friend_added",
            peer_id: requester,
            public_key_blob: this.registry.publicKeyOf(requester),
          });
        }
        return;
      }

      case "message": {
        const envelope = this.router.route(peer.id, frame.to_id, frame.ciphertext);
        this.logger.debug({ from: envelope.from_id, to: envelope.to_id }, "message_routed");
        await this.reply(peer, {
          type: "message_sent",
          to_id: envelope.to_id,
          timestamp: envelope.timestamp,
        });
        return;
      }

      case "get_friends": {
        await this.reply(peer, {
          type: "friends_list",
          friends: this.describeFriends(peer.id),
          incoming: this.friends.incomingOf(peer.id),
          outgoing: this.friends.outgoingOf(peer.id),
        });
        return;
      }

      case "ping": {
        await this.reply(peer, { type: "pong" });
        return;
      }

      case "pong":
        return;

      default:
        assertNever(frame);
    }
  }

  private describeFriends(id: Identity): FriendSummary[] {
    return this.friends.friendsOf(id).map((friendId) => ({
      id: friendId,
      public_key_blob: this.registry.publicKeyOf(friendId),
      online: this.registry.isLive(friendId),
    }));
  }

  /** Queue a frame for another session without waiting for its flush. */
  private forward(to: Identity, frame: ServerFrame): void {
    const peer = this.peers.get(to);
    if (!peer) return;
    void this.push(peer, frame);
  }

  /** Send a frame to the session whose handler is running and wait for the flush. */
  private reply(peer: PeerSession, frame: ServerFrame): Promise<boolean> {
    return this.push(peer, frame);
  }

  private sendError(peer: PeerSession, error: RelayError): Promise<boolean> {
    return this.reply(peer, { type: "error", code: error.code, message: error.message });
  }

  /** Append to the session's outbox. Resolves false when the frame was not flushed; never rejects. */
  private push(peer: PeerSession, frame: ServerFrame): Promise<boolean> {
    const connection = this.registry.lookup(peer.id);
    if (peer.state === "closed" || !connection) {
      return Promise.resolve(false);
    }

    const data = encodeServerFrame(frame);
    const flushed = peer.outbox
      .then(async () => {
        if (peer.state === "closed") return false;
        await connection.send(data);
        return true;
      })
      .catch((error: unknown) => {
        this.logger.debug({ id: peer.id, type: frame.type, err: error }, "send_failed");
        return false;
      });
    peer.outbox = flushed.then(() => undefined);
    return flushed;
  }
}
