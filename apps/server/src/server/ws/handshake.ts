import { createHash } from "node:crypto";
import { ProtocolError } from "@ashfall/contracts";

export const WEBSOCKET_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

export const BAD_REQUEST_RESPONSE = "HTTP/1.1 400 Bad Request\r\n\r\n";

/** Upper bound on the HTTP upgrade head, terminator included. */
export const MAX_HANDSHAKE_BYTES = 8 * 1024;

const HEADER_TERMINATOR = "\r\n\r\n";

export interface HandshakeRequest {
  method: string;
  path: string;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  key: string;
}

export function computeAcceptKey(key: string): string {
  return createHash("sha1").update(key + WEBSOCKET_GUID).digest("base64");
}

/** Index just past the blank line ending the request head, or -1. */
export function findHeadEnd(buffer: Buffer): number {
  const index = buffer.indexOf(HEADER_TERMINATOR);
  return index === -1 ? -1 : index + HEADER_TERMINATOR.length;
}

export function parseHandshake(head: string): HandshakeRequest {
  const [requestLine = "", ...lines] = head.split("\r\n");
  const [method = "", path = "", version = ""] = requestLine.split(" ");
  if (!method || !path || !version.startsWith("HTTP/")) {
    throw ProtocolError.handshakeInvalid("Malformed request line", { requestLine });
  }

  const headers: Record<string, string> = {};
  for (const line of lines) {
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }

  const key = headers["sec-websocket-key"];
  if (!key) {
    throw ProtocolError.handshakeInvalid("Missing Sec-WebSocket-Key header");
  }

  return { method, path, headers, key };
}

export function buildUpgradeResponse(key: string): string {
  return (
    "HTTP/1.1 101 Switching Protocols\r\n" +
    "Upgrade: websocket\r\n" +
    "Connection: Upgrade\r\n" +
    `Sec-WebSocket-Accept: ${computeAcceptKey(key)}\r\n` +
    "\r\n"
  );
}
