import { RelayError } from "./errors.js";
import type { Identity } from "./types.js";

type Liveness = {
  isLive(id: Identity): boolean;
};

export type FriendRequestOutcome = {
  /** False when an identical request was already pending. */
  created: boolean;
};

export type FriendResponseOutcome = {
  accepted: boolean;
};

function addTo(index: Map<Identity, Set<Identity>>, key: Identity, value: Identity): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(value);
}

function removeFrom(index: Map<Identity, Set<Identity>>, key: Identity, value: Identity): boolean {
  const set = index.get(key);
  if (!set) return false;
  const removed = set.delete(value);
  if (set.size === 0) {
    index.delete(key);
  }
  return removed;
}

function has(index: Map<Identity, Set<Identity>>, key: Identity, value: Identity): boolean {
  return index.get(key)?.has(value) ?? false;
}

/**
 * Pending and accepted relationships between identities.
 *
 * Pending requests are stored twice (outgoing on the requester, incoming on
 * the target) so both sides can be cleared in O(degree) on disconnect.
 *
 * When one side of a friendship disconnects, the survivor keeps it in its
 * friend set until the survivor also leaves. Such a departed identity is
 * "retained" so the allocator never hands it to a new session while a live
 * session still trusts it.
 */
export class FriendStore {
  private readonly friends = new Map<Identity, Set<Identity>>();
  private readonly outgoing = new Map<Identity, Set<Identity>>();
  private readonly incoming = new Map<Identity, Set<Identity>>();
  private readonly departed = new Set<Identity>();

  constructor(private readonly liveness: Liveness) {}

  request(from: Identity, to: Identity): FriendRequestOutcome {
    if (from === to) {
      throw new RelayError("SelfRequest", "Cannot send a friend request to yourself");
    }
    if (!this.liveness.isLive(to)) {
      throw new RelayError("UnknownTarget", `Identity ${to} is not connected`);
    }
    if (this.areFriends(from, to)) {
      throw new RelayError("AlreadyFriends", `Already friends with ${to}`);
    }
    if (has(this.outgoing, from, to)) {
      return { created: false };
    }

    addTo(this.outgoing, from, to);
    addTo(this.incoming, to, from);
    return { created: true };
  }

  respond(responder: Identity, requester: Identity, accept: boolean): FriendResponseOutcome {
    if (!has(this.incoming, responder, requester)) {
      throw new RelayError("NoSuchRequest", `No pending request from ${requester}`);
    }

    this.clearPending(requester, responder);

    if (!accept) {
      return { accepted: false };
    }

    // A crossed request in the other direction is settled by this acceptance.
    this.clearPending(responder, requester);
    addTo(this.friends, responder, requester);
    addTo(this.friends, requester, responder);
    return { accepted: true };
  }

  areFriends(a: Identity, b: Identity): boolean {
    return has(this.friends, a, b) && has(this.friends, b, a);
  }

  friendsOf(id: Identity): Identity[] {
    return Array.from(this.friends.get(id) ?? []);
  }

  incomingOf(id: Identity): Identity[] {
    return Array.from(this.incoming.get(id) ?? []);
  }

  outgoingOf(id: Identity): Identity[] {
    return Array.from(this.outgoing.get(id) ?? []);
  }

  hasPending(from: Identity, to: Identity): boolean {
    return has(this.outgoing, from, to);
  }

  isRetained(id: Identity): boolean {
    return this.departed.has(id);
  }

  get retainedCount(): number {
    return this.departed.size;
  }

  /**
   * Drop everything a disconnecting identity owns: its pending requests in
   * both directions, and its friendships with parties that already left.
   */
  removeIdentity(id: Identity): void {
    for (const target of this.outgoingOf(id)) {
      this.clearPending(id, target);
    }
    for (const requester of this.incomingOf(id)) {
      this.clearPending(requester, id);
    }

    let liveFriends = 0;
    for (const friend of this.friendsOf(id)) {
      if (this.departed.has(friend)) {
        this.unlink(id, friend);
      } else if (this.liveness.isLive(friend)) {
        liveFriends++;
      } else {
        this.unlink(id, friend);
      }
    }

    if (liveFriends > 0) {
      this.departed.add(id);
    } else {
      this.friends.delete(id);
      this.departed.delete(id);
    }
  }

  private clearPending(from: Identity, to: Identity): void {
    removeFrom(this.outgoing, from, to);
    removeFrom(this.incoming, to, from);
  }

  private unlink(a: Identity, b: Identity): void {
    removeFrom(this.friends, a, b);
    removeFrom(this.friends, b, a);
    for (const id of [a, b]) {
      if (this.departed.has(id) && !this.friends.has(id)) {
        this.departed.delete(id);
      }
    }
  }
}
