export type DecodeErrorKind =
  | "MalformedVarint"
  | "TruncatedMessage"
  | "InvalidWireType";

/** Returned (never thrown) by the codec; the offending frame is dropped. */
export class DecodeError extends Error {
  constructor(public readonly kind: DecodeErrorKind, message: string) {
    super(message);
    this.name = `DecodeError(${kind})`;
  }

  static malformedVarint(offset: number) {
    return new DecodeError("MalformedVarint", `Unterminated or oversized varint at offset ${offset}`);
  }

  static truncated(offset: number, wanted: number, available: number) {
    return new DecodeError(
      "TruncatedMessage",
      `Field at offset ${offset} declares ${wanted} bytes, ${available} remain`
    );
  }

  static invalidWireType(offset: number, wireType: number) {
    return new DecodeError("InvalidWireType", `Unsupported wire type ${wireType} at offset ${offset}`);
  }
}

export type FrameErrorKind = "FrameTooLarge";

export class FrameError extends Error {
  constructor(public readonly kind: FrameErrorKind, message: string) {
    super(message);
    this.name = `FrameError(${kind})`;
  }

  static tooLarge(length: number, max: number) {
    return new FrameError("FrameTooLarge", `Frame of ${length} bytes exceeds limit of ${max}`);
  }
}

export type ConnectionErrorKind = "Refused" | "Reset" | "PeerClosed" | "NotConnected";

export class ConnectionError extends Error {
  constructor(public readonly kind: ConnectionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `ConnectionError(${kind})`;
  }

  static peerClosed(buffered: number) {
    return new ConnectionError(
      "PeerClosed",
      buffered > 0 ? `Peer closed with ${buffered} bytes of an incomplete frame` : "Peer closed the connection"
    );
  }

  static notConnected() {
    return new ConnectionError("NotConnected", "Connection is not open");
  }

  static aborted() {
    return new ConnectionError("NotConnected", "Connect aborted");
  }

  /** Map a socket error onto the taxonomy. */
  static fromSocket(err: unknown): ConnectionError {
    if (err instanceof ConnectionError) return err;
    const code = errorCode(err);
    const message = err instanceof Error ? err.message : String(err);
    return new ConnectionError(code === "ECONNREFUSED" ? "Refused" : "Reset", message, { cause: err });
  }
}

export class PolicyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PolicyError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid run configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const errorCode = (err: unknown): string | undefined =>
  typeof err === "object" && err !== null && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
