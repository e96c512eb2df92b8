export { Relay, DEFAULT_MAX_BLOB_LENGTH } from "./relay.js";
export type { RelayOptions } from "./relay.js";
export { ConnectionRegistry } from "./connection-registry.js";
export { FriendStore } from "./friend-store.js";
export type { FriendRequestOutcome, FriendResponseOutcome } from "./friend-store.js";
export { IdentityAllocator, IDENTITY_ALPHABET, IDENTITY_LENGTH } from "./identity-allocator.js";
export { MessageRouter } from "./message-router.js";
export type { ForwardFrame, MessageEnvelope } from "./message-router.js";
export { HeartbeatMonitor, DEFAULT_HEARTBEAT } from "./heartbeat.js";
export type { HeartbeatOptions } from "./heartbeat.js";
export { RelayError, isRelayError } from "./errors.js";
export type { RelayErrorCode, RelayErrorKind } from "./errors.js";
export { parseClientFrame, encodeServerFrame, ClientFrameSchema } from "./protocol.js";
export type { ClientFrame, ServerFrame, FriendSummary } from "./protocol.js";
export type {
  DisconnectReason,
  Identity,
  PeerConnection,
  RegisteredSession,
  RelayEvents,
  SessionState,
} from "./types.js";
