import { z } from "zod";
import { RelayError } from "./errors.js";
import type { RelayErrorCode } from "./errors.js";

/**
 * Wire protocol between clients and the relay.
 *
 * Every frame is a JSON object with a `type` discriminator. `ciphertext` and
 * `public_key_blob` are opaque strings: they are length-checked and passed
 * through untouched.
 */

const IdentityField = z.string().trim().toUpperCase().min(1);
const OpaqueBlob = z.string().min(1);

export const RegisterKeyFrameSchema = z.object({
  type: z.literal("register_key"),
  public_key_blob: OpaqueBlob,
});

export const FriendRequestFrameSchema = z.object({
  type: z.literal("friend_request"),
  to_id: IdentityField,
});

export const FriendResponseFrameSchema = z.object({
  type: z.literal("friend_response"),
  from_id: IdentityField,
  accept: z.boolean(),
});

export const MessageFrameSchema = z.object({
  type: z.literal("message"),
  to_id: IdentityField,
  ciphertext: OpaqueBlob,
});

export const GetFriendsFrameSchema = z.object({ type: z.literal("get_friends") });
export const PingFrameSchema = z.object({ type: z.literal("ping") });
export const PongFrameSchema = z.object({ type: z.literal("pong") });

export const ClientFrameSchema = z.discriminatedUnion("type", [
  RegisterKeyFrameSchema,
  FriendRequestFrameSchema,
  FriendResponseFrameSchema,
  MessageFrameSchema,
  GetFriendsFrameSchema,
  PingFrameSchema,
  PongFrameSchema,
]);

export type ClientFrame = z.infer<typeof ClientFrameSchema>;
export type ClientFrameType = ClientFrame["type"];

const CLIENT_FRAME_TYPES: ReadonlySet<string> = new Set<ClientFrameType>([
  "register_key",
  "friend_request",
  "friend_response",
  "message",
  "get_friends",
  "ping",
  "pong",
]);

export type FriendSummary = {
  id: string;
  public_key_blob: string | null;
  online: boolean;
};

export type ServerFrame =
  | { type: "identity_assigned"; id: string }
  | { type: "key_registered" }
  | { type: "friend_request_sent"; to_id: string }
  | { type: "friend_request_incoming"; from_id: string; public_key_blob: string | null }
  | {
      type: "friend_response_result";
      peer_id: string;
      accepted: boolean;
      public_key_blob: string | null;
    }
  | { type: "friend_added"; peer_id: string; public_key_blob: string | null }
  | { type: "message_incoming"; from_id: string; ciphertext: string; timestamp: number }
  | { type: "message_sent"; to_id: string; timestamp: number }
  | {
      type: "friends_list";
      friends: FriendSummary[];
      incoming: string[];
      outgoing: string[];
    }
  | { type: "ping" }
  | { type: "pong" }
  | { type: "error"; code: RelayErrorCode; message: string };

export type ParseOptions = {
  /** Upper bound for `ciphertext` and `public_key_blob`, in UTF-16 code units. */
  maxBlobLength?: number;
};

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Decode one inbound frame. Throws `RelayError` with `MalformedFrame` or
 * `UnknownType`; never returns a partially valid frame.
 */
export function parseClientFrame(raw: string, options: ParseOptions = {}): ClientFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new RelayError("MalformedFrame", "Frame is not valid JSON");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new RelayError("MalformedFrame", "Frame must be a JSON object");
  }

  const type: unknown = Reflect.get(parsed, "type");
  if (typeof type !== "string") {
    throw new RelayError("MalformedFrame", "Frame is missing a string 'type'");
  }
  if (!CLIENT_FRAME_TYPES.has(type)) {
    throw new RelayError("UnknownType", `Unknown frame type '${type}'`);
  }

  const result = ClientFrameSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new RelayError(
      "MalformedFrame",
      first ? `Invalid '${type}' frame (${describeIssue(first)})` : `Invalid '${type}' frame`
    );
  }

  const frame = result.data;
  const limit = options.maxBlobLength;
  if (limit !== undefined) {
    const blob =
      frame.type === "message"
        ? frame.ciphertext
        : frame.type === "register_key"
          ? frame.public_key_blob
          : null;
    if (blob !== null && blob.length > limit) {
      throw new RelayError("MalformedFrame", `Payload exceeds ${limit} characters`);
    }
  }

  return frame;
}

export function encodeServerFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
