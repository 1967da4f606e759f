/**
 * Error codes carried by `error` messages sent to clients.
 */
export type WireErrorCode =
  | "INVALID_MESSAGE"
  | "RATE_LIMITED"
  | "NOT_AUTHENTICATED"
  | "NOT_IN_GAME"
  | "QUEUE_FULL"
  | "INTERNAL_ERROR";

export type ProtocolErrorCode =
  | "HANDSHAKE_INVALID"
  | "FRAME_MALFORMED"
  | "FRAME_TOO_LARGE"
  | "UNSUPPORTED_OPCODE";

/**
 * Malformed handshake or frame. The connection is closed; the server
 * keeps running.
 */
export class ProtocolError extends Error {
  readonly name = "ProtocolError";

  constructor(
    public readonly code: ProtocolErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProtocolError);
    }
  }

  static handshakeInvalid(message: string, details?: Record<string, unknown>): ProtocolError {
    return new ProtocolError("HANDSHAKE_INVALID", message, details);
  }

  static frameMalformed(message: string, details?: Record<string, unknown>): ProtocolError {
    return new ProtocolError("FRAME_MALFORMED", message, details);
  }

  static frameTooLarge(length: number, limit: number): ProtocolError {
    return new ProtocolError(
      "FRAME_TOO_LARGE",
      `Frame payload of ${length} bytes exceeds limit of ${limit}`,
      { length, limit },
    );
  }

  static isProtocolError(error: unknown): error is ProtocolError {
    return error instanceof ProtocolError;
  }

  toJSON(): {
    name: string;
    code: ProtocolErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export type MessageDecodeErrorCode =
  | "INVALID_JSON"
  | "INVALID_ENVELOPE"
  | "UNKNOWN_TYPE"
  | "INVALID_PAYLOAD";

/**
 * A text payload that is not a valid client envelope. Answered with an
 * `error` message; the connection stays open.
 */
export class MessageDecodeError extends Error {
  readonly name = "MessageDecodeError";

  constructor(
    public readonly code: MessageDecodeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MessageDecodeError);
    }
  }

  static isMessageDecodeError(error: unknown): error is MessageDecodeError {
    return error instanceof MessageDecodeError;
  }

  toJSON(): {
    name: string;
    code: MessageDecodeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
