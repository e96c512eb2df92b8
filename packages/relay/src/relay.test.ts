import { afterEach, describe, expect, test, vi } from "vitest";

import { ConnectionRegistry } from "./connection-registry.js";
import { IdentityAllocator } from "./identity-allocator.js";
import { MessageRouter, type MessageEnvelope } from "./message-router.js";
import { Relay, type RelayOptions } from "./relay.js";
import { catchError } from "./test-utils/catch-error.js";
import { MockConnection, createSilentLogger } from "./test-utils/mock-connection.js";
import { scriptedRandomIndex } from "./test-utils/scripted-random.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function createRelay(ids: string[], options: Partial<RelayOptions> = {}): Relay {
  return new Relay({
    logger: createSilentLogger(),
    heartbeat: false,
    randomIndex: scriptedRandomIndex(ids),
    now: () => 42,
    ...options,
  });
}

async function connectPair(relay: Relay) {
  const alice = new MockConnection();
  const bob = new MockConnection();
  const aliceId = relay.connect(alice);
  const bobId = relay.connect(bob);
  await flush();
  return { alice, bob, aliceId, bobId };
}

async function befriend(relay: Relay, requester: string, responder: string): Promise<void> {
  await relay.receive(requester, JSON.stringify({ type: "friend_request", to_id: responder }));
  await relay.receive(
    responder,
    JSON.stringify({ type: "friend_response", from_id: requester, accept: true })
  );
}

describe("Relay", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("assigns an identity and sends it before anything else", async () => {
    const relay = createRelay(["AB12CD"]);
    const connection = new MockConnection();

    const id = relay.connect(connection);
    expect(id).toBe("AB12CD");
    expect(relay.getSessionState(id)).toBe("connecting");

    await flush();

    expect(connection.frames()).toEqual([{ type: "identity_assigned", id: "AB12CD" }]);
    expect(relay.getSessionState(id)).toBe("registered");
    expect(relay.registry.isLive("AB12CD")).toBe(true);

    await relay.receive(id, '{"type":"ping"}');
    expect(relay.getSessionState(id)).toBe("active");
  });

  test("runs the full friend and message exchange between two clients", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob, aliceId, bobId } = await connectPair(relay);
    expect(aliceId).toBe("AB12CD");
    expect(bobId).toBe("XY99ZZ");

    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"XY99ZZ"}');
    expect(bob.lastFrame()).toEqual({
      type: "friend_request_incoming",
      from_id: "AB12CD",
      public_key_blob: null,
    });
    expect(alice.lastFrame()).toEqual({ type: "friend_request_sent", to_id: "XY99ZZ" });

    await relay.receive("XY99ZZ", '{"type":"friend_response","from_id":"AB12CD","accept":true}');
    expect(alice.lastFrame()).toEqual({
      type: "friend_response_result",
      peer_id: "XY99ZZ",
      accepted: true,
      public_key_blob: null,
    });
    expect(bob.lastFrame()).toEqual({ type: "friend_added", peer_id: "AB12CD", public_key_blob: null });
    expect(relay.friends.areFriends("AB12CD", "XY99ZZ")).toBe(true);
    expect(relay.friends.areFriends("XY99ZZ", "AB12CD")).toBe(true);
    expect(relay.friends.hasPending("AB12CD", "XY99ZZ")).toBe(false);

    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"Qk1..."}');
    expect(bob.lastFrame()).toEqual({
      type: "message_incoming",
      from_id: "AB12CD",
      ciphertext: "Qk1...",
      timestamp: 42,
    });
    expect(alice.lastFrame()).toEqual({ type: "message_sent", to_id: "XY99ZZ", timestamp: 42 });
  });

  test("hands out registered public keys alongside friend notifications", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"register_key","public_key_blob":"pk-alice"}');
    await relay.receive("XY99ZZ", '{"type":"register_key","public_key_blob":"pk-bob"}');
    expect(alice.lastFrame()).toEqual({ type: "key_registered" });

    await befriend(relay, "AB12CD", "XY99ZZ");

    expect(bob.framesOfType("friend_request_incoming")).toEqual([
      { type: "friend_request_incoming", from_id: "AB12CD", public_key_blob: "pk-alice" },
    ]);
    expect(alice.lastFrame()).toEqual({
      type: "friend_response_result",
      peer_id: "XY99ZZ",
      accepted: true,
      public_key_blob: "pk-bob",
    });
    expect(bob.lastFrame()).toEqual({
      type: "friend_added",
      peer_id: "AB12CD",
      public_key_blob: "pk-alice",
    });
  });

  test("answers a malformed frame with an error and keeps the session", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice } = await connectPair(relay);

    await relay.receive("AB12CD", "{definitely not json");
    expect(alice.lastFrame()).toEqual({
      type: "error",
      code: "MalformedFrame",
      message: "Frame is not valid JSON",
    });

    await relay.receive("AB12CD", '{"type":"teleport"}');
    expect(alice.lastFrame()).toEqual({
      type: "error",
      code: "UnknownType",
      message: "Unknown frame type 'teleport'",
    });

    await relay.receive("AB12CD", '{"type":"friend_request"}');
    expect(alice.lastFrame()).toMatchObject({ type: "error", code: "MalformedFrame" });

    expect(relay.registry.isLive("AB12CD")).toBe(true);
    expect(relay.friends.outgoingOf("AB12CD")).toEqual([]);
  });

  test("rejects a friend request to an unknown identity without pending state", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"QQQQQQ"}');

    expect(alice.lastFrame()).toEqual({
      type: "error",
      code: "UnknownTarget",
      message: "Identity QQQQQQ is not connected",
    });
    expect(relay.friends.outgoingOf("AB12CD")).toEqual([]);
  });

  test("a duplicate request notifies the target only once", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"XY99ZZ"}');
    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"xy99zz"}');

    expect(bob.framesOfType("friend_request_incoming")).toHaveLength(1);
    expect(alice.framesOfType("friend_request_sent")).toHaveLength(2);
  });

  test("declining notifies the requester and a second decline fails", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"XY99ZZ"}');
    await relay.receive("XY99ZZ", '{"type":"friend_response","from_id":"AB12CD","accept":false}');

    expect(alice.lastFrame()).toEqual({
      type: "friend_response_result",
      peer_id: "XY99ZZ",
      accepted: false,
      public_key_blob: null,
    });
    expect(relay.friends.areFriends("AB12CD", "XY99ZZ")).toBe(false);

    await relay.receive("XY99ZZ", '{"type":"friend_response","from_id":"AB12CD","accept":false}');
    expect(bob.lastFrame()).toEqual({
      type: "error",
      code: "NoSuchRequest",
      message: "No pending request from AB12CD",
    });
  });

  test("refuses to route between identities that are not friends", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"Qk1..."}');

    expect(alice.lastFrame()).toEqual({
      type: "error",
      code: "NotFriends",
      message: "Not friends with XY99ZZ",
    });
    expect(bob.frames()).toEqual([{ type: "identity_assigned", id: "XY99ZZ" }]);
  });

  test("disconnecting the requester cancels its pending request", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { bob } = await connectPair(relay);

    await relay.receive("AB12CD", '{"type":"friend_request","to_id":"XY99ZZ"}');
    expect(relay.disconnect("AB12CD", "closed")).toBe(true);

    await relay.receive("XY99ZZ", '{"type":"friend_response","from_id":"AB12CD","accept":true}');

    expect(bob.lastFrame()).toEqual({
      type: "error",
      code: "NoSuchRequest",
      message: "No pending request from AB12CD",
    });
  });

  test("disconnect is idempotent and reported once", async () => {
    const closed: string[] = [];
    const relay = createRelay(["AB12CD"], {
      events: { onSessionClosed: (id, reason) => closed.push(`${id}:${reason}`) },
    });
    const connection = new MockConnection();
    relay.connect(connection);
    await flush();

    expect(relay.disconnect("AB12CD", "closed")).toBe(true);
    expect(relay.disconnect("AB12CD", "heartbeat_timeout")).toBe(false);

    expect(closed).toEqual(["AB12CD:closed"]);
    expect(relay.getSessionState("AB12CD")).toBe("closed");
    expect(relay.registry.isLive("AB12CD")).toBe(false);
  });

  test("ignores frames that arrive after the session closed", async () => {
    const relay = createRelay(["AB12CD"]);
    const connection = new MockConnection();
    relay.connect(connection);
    await flush();
    relay.disconnect("AB12CD", "closed");
    connection.clear();

    await relay.receive("AB12CD", '{"type":"ping"}');

    expect(connection.sent).toEqual([]);
  });

  test("answers ping with pong", async () => {
    const relay = createRelay(["AB12CD"]);
    const connection = new MockConnection();
    relay.connect(connection);

    await relay.receive("AB12CD", '{"type":"ping"}');
    await relay.receive("AB12CD", '{"type":"pong"}');

    expect(connection.frames()).toEqual([
      { type: "identity_assigned", id: "AB12CD" },
      { type: "pong" },
    ]);
  });

  test("lists friends with their key and presence", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice } = await connectPair(relay);
    await relay.receive("XY99ZZ", '{"type":"register_key","public_key_blob":"pk-bob"}');
    await befriend(relay, "AB12CD", "XY99ZZ");

    await relay.receive("AB12CD", '{"type":"get_friends"}');

    expect(alice.lastFrame()).toEqual({
      type: "friends_list",
      friends: [{ id: "XY99ZZ", public_key_blob: "pk-bob", online: true }],
      incoming: [],
      outgoing: [],
    });
  });

  test("delivers one sender's messages in the order they were sent", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { bob } = await connectPair(relay);
    await befriend(relay, "AB12CD", "XY99ZZ");
    bob.clear();

    await Promise.all(
      ["m1", "m2", "m3", "m4"].map((ciphertext) =>
        relay.receive("AB12CD", JSON.stringify({ type: "message", to_id: "XY99ZZ", ciphertext }))
      )
    );

    expect(bob.frames()).toMatchObject([
      { ciphertext: "m1" },
      { ciphertext: "m2" },
      { ciphertext: "m3" },
      { ciphertext: "m4" },
    ]);
  });

  test("a friend that went offline yields RecipientOffline", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice } = await connectPair(relay);
    await befriend(relay, "AB12CD", "XY99ZZ");

    relay.disconnect("XY99ZZ", "closed");
    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"Qk1..."}');

    expect(alice.lastFrame()).toEqual({
      type: "error",
      code: "RecipientOffline",
      message: "Identity XY99ZZ is offline",
    });
  });

  test("a recipient that stops draining does not hold up the sender", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ", "CC33DD"]);
    const { alice, bob } = await connectPair(relay);
    const carol = new MockConnection();
    relay.connect(carol);
    await flush();
    await befriend(relay, "AB12CD", "XY99ZZ");
    await befriend(relay, "AB12CD", "CC33DD");
    bob.stallSends = true;

    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"one"}');
    await relay.receive("AB12CD", '{"type":"ping"}');
    await relay.receive("AB12CD", '{"type":"message","to_id":"CC33DD","ciphertext":"two"}');

    expect(alice.framesOfType("pong")).toEqual([{ type: "pong" }]);
    expect(alice.lastFrame()).toEqual({ type: "message_sent", to_id: "CC33DD", timestamp: 42 });
    expect(carol.lastFrame()).toEqual({
      type: "message_incoming",
      from_id: "AB12CD",
      ciphertext: "two",
      timestamp: 42,
    });
    expect(bob.framesOfType("message_incoming")).toEqual([]);
  });

  test("drops a frame whose push to the recipient fails and keeps going", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);
    await befriend(relay, "AB12CD", "XY99ZZ");

    bob.failSends = true;
    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"one"}');
    await flush();
    bob.failSends = false;
    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"two"}');
    await flush();

    expect(bob.framesOfType("message_incoming")).toEqual([
      { type: "message_incoming", from_id: "AB12CD", ciphertext: "two", timestamp: 42 },
    ]);
    expect(alice.framesOfType("message_sent")).toEqual([
      { type: "message_sent", to_id: "XY99ZZ", timestamp: 42 },
      { type: "message_sent", to_id: "XY99ZZ", timestamp: 42 },
    ]);
  });

  test("does not reuse an identity a live friend still references", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ", "AB12CD", "CC33DD"]);
    await connectPair(relay);
    await befriend(relay, "AB12CD", "XY99ZZ");
    relay.disconnect("AB12CD", "closed");

    const id = relay.connect(new MockConnection());

    expect(id).toBe("CC33DD");
    expect(relay.friends.areFriends("XY99ZZ", "CC33DD")).toBe(false);
  });

  test("tears down silent sessions on heartbeat timeout", async () => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
    let now = 0;
    const relay = createRelay(["AB12CD", "XY99ZZ"], {
      heartbeat: { intervalMs: 1_000, timeoutMs: 3_000 },
      now: () => now,
    });
    relay.start();
    const { alice, bob } = await connectPair(relay);
    await befriend(relay, "AB12CD", "XY99ZZ");

    now = 2_000;
    await relay.receive("XY99ZZ", '{"type":"pong"}');
    now = 3_500;
    vi.advanceTimersByTime(1_000);

    expect(alice.closed).toEqual({ code: 4000, reason: "Heartbeat timeout" });
    expect(relay.registry.isLive("AB12CD")).toBe(false);
    expect(relay.registry.isLive("XY99ZZ")).toBe(true);

    await relay.receive("XY99ZZ", '{"type":"message","to_id":"AB12CD","ciphertext":"Qk1..."}');
    expect(bob.lastFrame()).toMatchObject({ type: "error", code: "RecipientOffline" });

    await relay.receive("XY99ZZ", '{"type":"friend_request","to_id":"AB12CD"}');
    expect(bob.lastFrame()).toMatchObject({ type: "error", code: "UnknownTarget" });

    relay.stop();
  });

  test("closes the connection when no identity can be allocated", () => {
    const registry = new ConnectionRegistry();
    const allocator = new IdentityAllocator({
      alphabet: "A",
      length: 1,
      maxFill: 1,
      isTaken: (id) => registry.isLive(id),
      takenCount: () => registry.size,
    });
    const relay = new Relay({ logger: createSilentLogger(), heartbeat: false, registry, allocator });

    expect(relay.connect(new MockConnection())).toBe("A");
    const rejected = new MockConnection();
    const error = catchError(() => relay.connect(rejected));

    expect(error).toMatchObject({ code: "ExhaustedNamespace" });
    expect(rejected.closed).toEqual({ code: 1013, reason: "No identities available" });
    expect(relay.sessionCount).toBe(1);
  });

  test("reports unexpected failures as InternalError without closing the session", async () => {
    class FailingRouter extends MessageRouter {
      route(): MessageEnvelope {
        throw new Error("boom");
      }
    }
    const registry = new ConnectionRegistry();
    const errors: string[] = [];
    const relay = createRelay(["AB12CD"], {
      registry,
      router: new FailingRouter({
        registry,
        friends: { areFriends: () => true },
        forward: () => {},
      }),
      events: { onError: (id, error) => errors.push(`${id}:${error.message}`) },
    });
    const connection = new MockConnection();
    relay.connect(connection);

    await relay.receive("AB12CD", '{"type":"message","to_id":"XY99ZZ","ciphertext":"x"}');

    expect(connection.lastFrame()).toEqual({
      type: "error",
      code: "InternalError",
      message: "Internal relay error",
    });
    expect(errors).toEqual(["AB12CD:boom"]);
    expect(relay.registry.isLive("AB12CD")).toBe(true);
  });

  test("stop closes every live session", async () => {
    const relay = createRelay(["AB12CD", "XY99ZZ"]);
    const { alice, bob } = await connectPair(relay);

    relay.stop();

    expect(alice.closed).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(bob.closed).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(relay.sessionCount).toBe(0);
  });
});
