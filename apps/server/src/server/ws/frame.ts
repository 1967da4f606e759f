/**
 * WebSocket Frames
 *
 * Bit-exact frame codec:
 *
 * ```
 * byte 0   FIN (bit 7) | opcode (bits 0-3)
 * byte 1   MASK (bit 7) | 7-bit length (126 → 16-bit BE follows, 127 → 64-bit BE follows)
 * [mask]   4-byte key when MASK is set
 * payload  XORed with key[i % 4] when masked
 * ```
 *
 * Client frames arrive masked; server frames are never masked.
 */

import { ProtocolError } from "@ashfall/contracts";

// =============================================================================
// Opcodes
// =============================================================================

export const Opcode = {
  Continuation: 0x0,
  Text: 0x1,
  Binary: 0x2,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

export function isControlOpcode(opcode: number): boolean {
  return (opcode & 0x8) !== 0;
}

/** Largest payload accepted from a client before the frame is rejected. */
export const DEFAULT_MAX_PAYLOAD = 1024 * 1024;

const MAX_CONTROL_PAYLOAD = 125;

// =============================================================================
// Types
// =============================================================================

export interface Frame {
  fin: boolean;
  opcode: Opcode;
  masked: boolean;
  payload: Buffer;
}

/**
 * `incomplete` means the buffer holds a valid prefix: keep it and retry once
 * more bytes arrive. Malformed input throws {@link ProtocolError} instead.
 */
export type FrameParseResult =
  | { status: "incomplete" }
  | { status: "frame"; frame: Frame; consumed: number };

const INCOMPLETE: FrameParseResult = { status: "incomplete" };

// =============================================================================
// Masking
// =============================================================================

export function applyMask(payload: Uint8Array, mask: Uint8Array): Buffer {
  if (mask.length !== 4) {
    throw new RangeError(`Mask key must be 4 bytes, got ${mask.length}`);
  }
  const out = Buffer.allocUnsafe(payload.length);
  for (let i = 0; i < payload.length; i++) {
    out[i] = payload[i] ^ mask[i & 3];
  }
  return out;
}

// =============================================================================
// Parsing
// =============================================================================

function toOpcode(value: number): Opcode | undefined {
  for (const opcode of Object.values(Opcode)) {
    if (opcode === value) return opcode;
  }
  return undefined;
}

export function parseFrame(
  buffer: Buffer,
  maxPayload: number = DEFAULT_MAX_PAYLOAD,
): FrameParseResult {
  if (buffer.length < 2) return INCOMPLETE;

  const first = buffer[0];
  const second = buffer[1];
  const fin = (first & 0x80) !== 0;
  const rawOpcode = first & 0x0f;
  const masked = (second & 0x80) !== 0;
  let length = second & 0x7f;
  let offset = 2;

  if ((first & 0x70) !== 0) {
    throw ProtocolError.frameMalformed("Reserved bits set without a negotiated extension", {
      byte0: first,
    });
  }

  const opcode = toOpcode(rawOpcode);
  if (opcode === undefined) {
    throw new ProtocolError("UNSUPPORTED_OPCODE", `Unsupported opcode 0x${rawOpcode.toString(16)}`, {
      opcode: rawOpcode,
    });
  }

  if (length === 126) {
    if (buffer.length < 4) return INCOMPLETE;
    length = buffer.readUInt16BE(2);
    offset = 4;
  } else if (length === 127) {
    if (buffer.length < 10) return INCOMPLETE;
    const high = buffer.readUInt32BE(2);
    if ((high & 0x80000000) !== 0) {
      throw ProtocolError.frameMalformed("64-bit length has its most significant bit set");
    }
    length = high * 2 ** 32 + buffer.readUInt32BE(6);
    offset = 10;
  }

  if (isControlOpcode(opcode) && (length > MAX_CONTROL_PAYLOAD || !fin)) {
    throw ProtocolError.frameMalformed("Control frames must be final and at most 125 bytes", {
      opcode,
      length,
    });
  }

  if (length > maxPayload) {
    throw ProtocolError.frameTooLarge(length, maxPayload);
  }

  let mask: Buffer | undefined;
  if (masked) {
    if (buffer.length < offset + 4) return INCOMPLETE;
    mask = buffer.subarray(offset, offset + 4);
    offset += 4;
  }

  if (buffer.length < offset + length) return INCOMPLETE;

  const body = buffer.subarray(offset, offset + length);
  const payload = mask ? applyMask(body, mask) : Buffer.from(body);

  return {
    status: "frame",
    frame: { fin, opcode, masked, payload },
    consumed: offset + length,
  };
}

// =============================================================================
// Encoding
// =============================================================================

export interface EncodeFrameOptions {
  fin?: boolean;
  /** Only clients mask. Used by tests and tooling that act as a client. */
  mask?: Uint8Array;
}

export function encodeFrame(
  opcode: Opcode,
  payload: Uint8Array | string = Buffer.alloc(0),
  options: EncodeFrameOptions = {},
): Buffer {
  const body = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  const fin = options.fin ?? true;
  const maskBit = options.mask ? 0x80 : 0;
  const length = body.length;

  let header: Buffer;
  if (length <= 125) {
    header = Buffer.alloc(2);
    header[1] = maskBit | length;
  } else if (length <= 0xffff) {
    header = Buffer.alloc(4);
    header[1] = maskBit | 126;
    header.writeUInt16BE(length, 2);
  } else {
    header = Buffer.alloc(10);
    header[1] = maskBit | 127;
    header.writeUInt32BE(Math.floor(length / 2 ** 32), 2);
    header.writeUInt32BE(length >>> 0, 6);
  }
  header[0] = (fin ? 0x80 : 0) | opcode;

  if (options.mask) {
    return Buffer.concat([header, Buffer.from(options.mask), applyMask(body, options.mask)]);
  }
  return Buffer.concat([header, body]);
}
