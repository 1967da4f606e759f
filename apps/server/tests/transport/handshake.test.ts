import { ProtocolError } from "@ashfall/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  BAD_REQUEST_RESPONSE,
  buildUpgradeResponse,
  computeAcceptKey,
  encodeFrame,
  findHeadEnd,
  Opcode,
  parseHandshake,
  WebSocketServer,
} from "../../src/server/ws";
import { FakeSocket, flush } from "../helpers/fake-socket";

const SAMPLE_KEY = "dGhlIHNhbXBsZSBub25jZQ==";
const SAMPLE_ACCEPT = "s3pPLMBiTxaQ9kYGzzhZRbK+xOo=";

function upgradeRequest(key: string | null = SAMPLE_KEY): string {
  return [
    "GET /game HTTP/1.1",
    "Host: localhost:8765",
    "Upgrade: websocket",
    "Connection: Upgrade",
    ...(key === null ? [] : [`Sec-WebSocket-Key: ${key}`]),
    "Sec-WebSocket-Version: 13",
    "",
    "",
  ].join("\r\n");
}

describe("WebSocket handshake", () => {
  it("should compute the accept token", () => {
    expect(computeAcceptKey(SAMPLE_KEY)).toBe(SAMPLE_ACCEPT);
  });

  it("should find the end of the request head", () => {
    expect(findHeadEnd(Buffer.from("GET / HTTP/1.1\r\nHost: a\r\n\r\nrest"))).toBe(27);
    expect(findHeadEnd(Buffer.from("GET / HTTP/1.1\r\nHost: a\r\n"))).toBe(-1);
  });

  it("should parse the request line and lower-case header names", () => {
    const request = parseHandshake(upgradeRequest());
    expect(request.method).toBe("GET");
    expect(request.path).toBe("/game");
    expect(request.key).toBe(SAMPLE_KEY);
    expect(request.headers.upgrade).toBe("websocket");
    expect(request.headers["sec-websocket-version"]).toBe("13");
  });

  it("should reject a request without a key", () => {
    expect(() => parseHandshake(upgradeRequest(null))).toThrow("Missing Sec-WebSocket-Key header");
  });

  it("should reject a malformed request line", () => {
    let caught: unknown;
    try {
      parseHandshake("NONSENSE\r\nSec-WebSocket-Key: abc\r\n\r\n");
    } catch (error) {
      caught = error;
    }
    expect(ProtocolError.isProtocolError(caught) && caught.code).toBe("HANDSHAKE_INVALID");
  });

  it("should build the switching protocols response", () => {
    expect(buildUpgradeResponse(SAMPLE_KEY)).toBe(
      "HTTP/1.1 101 Switching Protocols\r\n" +
        "Upgrade: websocket\r\n" +
        "Connection: Upgrade\r\n" +
        `Sec-WebSocket-Accept: ${SAMPLE_ACCEPT}\r\n` +
        "\r\n",
    );
  });
});

describe("WebSocketServer", () => {
  const handlers = {
    onConnect: vi.fn(),
    onMessage: vi.fn(),
    onDisconnect: vi.fn(),
  };

  function createServer(handshakeTimeoutMs = 1000, closeTimeoutMs = 1000): WebSocketServer {
    return new WebSocketServer(
      { host: "127.0.0.1", port: 0, handshakeTimeoutMs, idlePingMs: 60_000, closeTimeoutMs },
      handlers,
    );
  }

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("should upgrade a valid request and register the connection", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);

    socket.receive(upgradeRequest());
    await flush();

    expect(socket.output().toString("latin1")).toBe(buildUpgradeResponse(SAMPLE_KEY));
    expect(handlers.onConnect).toHaveBeenCalledTimes(1);
    expect(handlers.onConnect.mock.calls[0][0].id).toBe("conn_1");
    expect(server.connectionCount).toBe(1);
  });

  it("should deliver frames that arrive with the handshake", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);

    const mask = Buffer.from([1, 2, 3, 4]);
    socket.receive(
      Buffer.concat([
        Buffer.from(upgradeRequest(), "latin1"),
        encodeFrame(Opcode.Text, '{"type":"ping"}', { mask }),
      ]),
    );
    await flush();

    expect(handlers.onMessage).toHaveBeenCalledTimes(1);
    expect(handlers.onMessage.mock.calls[0][1]).toBe('{"type":"ping"}');
  });

  it("should accept a head split across several chunks", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);

    const request = upgradeRequest();
    socket.receive(request.slice(0, 20));
    await flush();
    expect(socket.written).toHaveLength(0);

    socket.receive(request.slice(20));
    await flush();
    expect(socket.output().toString("latin1")).toBe(buildUpgradeResponse(SAMPLE_KEY));
  });

  it("should answer 400 and close when the key is missing", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);

    socket.receive(upgradeRequest(null));
    await flush();

    expect(socket.output().toString("latin1")).toBe(BAD_REQUEST_RESPONSE);
    expect(socket.ended).toBe(true);
    expect(handlers.onConnect).not.toHaveBeenCalled();
  });

  it("should drop sockets that never finish the handshake", async () => {
    const server = createServer(20);
    const socket = new FakeSocket();
    server.handleSocket(socket);

    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(socket.destroyed).toBe(true);
    expect(handlers.onConnect).not.toHaveBeenCalled();
  });

  it("should notify disconnect once when the client closes", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);
    socket.receive(upgradeRequest());
    await flush();

    const mask = Buffer.from([9, 8, 7, 6]);
    socket.receive(encodeFrame(Opcode.Close, Buffer.from([0x03, 0xe8]), { mask }));
    await flush();
    socket.destroy();
    await flush();

    expect(handlers.onDisconnect).toHaveBeenCalledTimes(1);
    expect(server.connectionCount).toBe(0);
  });

  it("should destroy sockets still in the handshake when closed", async () => {
    const server = createServer();
    const socket = new FakeSocket();
    server.handleSocket(socket);
    socket.receive("GET / HTTP/1.1\r\n");
    await flush();

    await server.close();

    expect(socket.destroyed).toBe(true);
    expect(handlers.onConnect).not.toHaveBeenCalled();
  });

  it("should destroy upgraded peers that ignore the close frame", async () => {
    const server = createServer(1000, 10);
    const socket = new FakeSocket();
    server.handleSocket(socket);
    socket.receive(upgradeRequest());
    await flush();

    await server.close();
    await flush();
    expect(socket.ended).toBe(true);
    expect(server.connectionCount).toBe(0);
    expect(handlers.onDisconnect).toHaveBeenCalledTimes(1);

    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(socket.destroyed).toBe(true);
  });
});
