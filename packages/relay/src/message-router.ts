import { RelayError } from "./errors.js";
import type { ConnectionRegistry } from "./connection-registry.js";
import type { FriendStore } from "./friend-store.js";
import type { ServerFrame } from "./protocol.js";
import type { Identity } from "./types.js";

export type MessageEnvelope = {
  from_id: Identity;
  to_id: Identity;
  ciphertext: string;
  timestamp: number;
};

/** Queues a frame for another connection. Must not wait for the flush. */
export type ForwardFrame = (to: Identity, frame: ServerFrame) => void;

type MessageRouterOptions = {
  registry: Pick<ConnectionRegistry, "isLive">;
  friends: Pick<FriendStore, "areFriends">;
  forward: ForwardFrame;
  now?: () => number;
};

/**
 * Forwards opaque payloads between friends. Transit only: a message for an
 * offline recipient is dropped, never queued.
 */
export class MessageRouter {
  private readonly registry: Pick<ConnectionRegistry, "isLive">;
  private readonly friends: Pick<FriendStore, "areFriends">;
  private readonly forward: ForwardFrame;
  private readonly now: () => number;

  constructor(options: MessageRouterOptions) {
    this.registry = options.registry;
    this.friends = options.friends;
    this.forward = options.forward;
    this.now = options.now ?? (() => Date.now());
  }

  route(from: Identity, to: Identity, ciphertext: string): MessageEnvelope {
    if (!this.friends.areFriends(from, to)) {
      throw new RelayError("NotFriends", `Not friends with ${to}`);
    }

    if (!this.registry.isLive(to)) {
      throw new RelayError("RecipientOffline", `Identity ${to} is offline`);
    }

    const envelope: MessageEnvelope = {
      from_id: from,
      to_id: to,
      ciphertext,
      timestamp: this.now(),
    };

    this.forward(to, {
      type: "message_incoming",
      from_id: envelope.from_id,
      ciphertext: envelope.ciphertext,
      timestamp: envelope.timestamp,
    });

    return envelope;
  }
}
