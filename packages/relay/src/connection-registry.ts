import type { Identity, PeerConnection, RegisteredSession } from "./types.js";

type ConnectionRegistryOptions = {
  now?: () => number;
};

/**
 * Owns the mapping from live identity to transport handle.
 *
 * All operations run synchronously on the event loop, so each call is atomic
 * with respect to every other connection.
 */
export class ConnectionRegistry {
  private readonly sessions = new Map<Identity, RegisteredSession>();
  private readonly now: () => number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  register(id: Identity, connection: PeerConnection): RegisteredSession {
    if (this.sessions.has(id)) {
      throw new Error(`Identity ${id} is already registered`);
    }
    const now = this.now();
    const session: RegisteredSession = {
      id,
      connection,
      publicKeyBlob: null,
      connectedAt: now,
      lastSeenAt: now,
    };
    this.sessions.set(id, session);
    return session;
  }

  /** Returns false when the identity was not registered. Safe to call repeatedly. */
  unregister(id: Identity): boolean {
    return this.sessions.delete(id);
  }

  lookup(id: Identity): PeerConnection | null {
    return this.sessions.get(id)?.connection ?? null;
  }

  isLive(id: Identity): boolean {
    return this.sessions.has(id);
  }

  touch(id: Identity): void {
    const session = this.sessions.get(id);
    if (session) {
      session.lastSeenAt = this.now();
    }
  }

  get(id: Identity): RegisteredSession | null {
    return this.sessions.get(id) ?? null;
  }

  setPublicKey(id: Identity, blob: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.publicKeyBlob = blob;
    return true;
  }

  publicKeyOf(id: Identity): string | null {
    return this.sessions.get(id)?.publicKeyBlob ?? null;
  }

  list(): RegisteredSession[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }
}
