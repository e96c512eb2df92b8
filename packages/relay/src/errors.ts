export type RelayErrorKind =
  | "protocol"
  | "authorization"
  | "not_found"
  | "resource"
  | "transport"
  | "internal";

export type RelayErrorCode =
  | "MalformedFrame"
  | "UnknownType"
  | "NotFriends"
  | "NoSuchRequest"
  | "SelfRequest"
  | "AlreadyFriends"
  | "UnknownTarget"
  | "RecipientOffline"
  | "ExhaustedNamespace"
  | "TransportClosed"
  | "InternalError";

const KIND_BY_CODE: Record<RelayErrorCode, RelayErrorKind> = {
  MalformedFrame: "protocol",
  UnknownType: "protocol",
  NotFriends: "authorization",
  NoSuchRequest: "authorization",
  SelfRequest: "authorization",
  AlreadyFriends: "authorization",
  UnknownTarget: "not_found",
  RecipientOffline: "not_found",
  ExhaustedNamespace: "resource",
  TransportClosed: "transport",
  InternalError: "internal",
};

/**
 * Error raised by relay operations. The `code` is sent to the client verbatim
 * in an `error` frame, so messages must never include payload contents.
 */
export class RelayError extends Error {
  readonly kind: RelayErrorKind;

  constructor(
    public readonly code: RelayErrorCode,
    message: string
  ) {
    super(message);
    this.name = "RelayError";
    this.kind = KIND_BY_CODE[code];
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
