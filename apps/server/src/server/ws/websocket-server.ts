import { createServer, type AddressInfo, type Server } from "node:net";
import type { Duplex } from "node:stream";
import { ProtocolError } from "@ashfall/contracts";
import { WebSocketConnection } from "./connection";
import {
  BAD_REQUEST_RESPONSE,
  buildUpgradeResponse,
  findHeadEnd,
  MAX_HANDSHAKE_BYTES,
  parseHandshake,
} from "./handshake";

// =============================================================================
// Types
// =============================================================================

export interface WebSocketServerOptions {
  host: string;
  port: number;
  handshakeTimeoutMs: number;
  idlePingMs: number;
  maxPayload?: number;
  closeTimeoutMs?: number;
}

export interface WebSocketServerHandlers {
  onConnect(connection: WebSocketConnection): void;
  onMessage(connection: WebSocketConnection, text: string): void;
  onDisconnect(connection: WebSocketConnection): void;
}

// =============================================================================
// WebSocketServer
// =============================================================================

/**
 * Accepts TCP sockets, performs the HTTP upgrade and wraps each socket in a
 * {@link WebSocketConnection} with id `conn_N`.
 *
 * @example
 * ```typescript
 * const server = new WebSocketServer(options, {
 *   onConnect: (conn) => coordinator.handleConnect(conn),
 *   onMessage: (conn, text) => coordinator.handleMessage(conn, text),
 *   onDisconnect: (conn) => coordinator.handleDisconnect(conn.id),
 * });
 * await server.listen();
 * ```
 */
export class WebSocketServer {
  private server: Server | null = null;
  private readonly connections = new Map<string, WebSocketConnection>();
  /** Sockets that have not finished the upgrade yet. */
  private readonly handshaking = new Set<Duplex>();
  private counter = 0;

  constructor(
    private readonly options: WebSocketServerOptions,
    private readonly handlers: WebSocketServerHandlers,
  ) {}

  get connectionCount(): number {
    return this.connections.size;
  }

  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error("WebSocket server is already listening"));
    }

    const server = createServer((socket) => this.handleSocket(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        server.on("error", (error) => console.error("[WS] Server error:", error));
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("WebSocket server is not bound to a TCP port"));
          return;
        }
        console.log(`[WS] Listening on ws://${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /**
   * Close every connection, drop sockets still in the handshake, then stop
   * accepting new ones. Resolves once every socket is gone; a peer that
   * ignores the close frame is destroyed after `closeTimeoutMs`.
   */
  async close(): Promise<void> {
    for (const socket of [...this.handshaking]) {
      socket.destroy();
    }
    this.handshaking.clear();

    for (const connection of [...this.connections.values()]) {
      connection.close();
    }
    this.connections.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    console.log("[WS] Stopped");
  }

  /**
   * Run the upgrade handshake on a raw socket. Public so tests can drive it
   * with an in-process stream.
   */
  handleSocket(socket: Duplex): void {
    let head: Buffer = Buffer.alloc(0);
    let done = false;

    this.handshaking.add(socket);
    socket.once("close", () => this.handshaking.delete(socket));

    const timer = setTimeout(() => {
      if (done || socket.destroyed) return;
      done = true;
      this.handshaking.delete(socket);
      socket.off("data", onData);
      console.warn("[WS] Handshake timed out");
      socket.destroy();
    }, this.options.handshakeTimeoutMs);
    timer.unref();

    const reject = (reason: string): void => {
      done = true;
      clearTimeout(timer);
      this.handshaking.delete(socket);
      socket.off("data", onData);
      console.warn(`[WS] Rejected upgrade: ${reason}`);
      socket.end(BAD_REQUEST_RESPONSE);
    };

    const onData = (chunk: Buffer): void => {
      if (done) return;
      head = Buffer.concat([head, chunk]);

      const end = findHeadEnd(head);
      if (end === -1) {
        if (head.length > MAX_HANDSHAKE_BYTES) reject("request head too large");
        return;
      }

      let key: string;
      try {
        key = parseHandshake(head.subarray(0, end).toString("latin1")).key;
      } catch (error) {
        if (!ProtocolError.isProtocolError(error)) throw error;
        reject(error.message);
        return;
      }

      done = true;
      clearTimeout(timer);
      this.handshaking.delete(socket);
      socket.off("data", onData);
      socket.write(buildUpgradeResponse(key));
      this.accept(socket, head.subarray(end));
    };

    socket.on("data", onData);
    socket.once("error", (error: Error) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      this.handshaking.delete(socket);
      console.warn("[WS] Socket error during handshake:", error.message);
      socket.destroy();
    });
  }

  private accept(socket: Duplex, pending: Buffer): void {
    const id = `conn_${++this.counter}`;
    const connection = new WebSocketConnection(
      id,
      socket,
      {
        onMessage: (conn, text) => this.handlers.onMessage(conn, text),
        onClose: (conn) => {
          this.connections.delete(conn.id);
          console.log(`[WS] Connection closed: ${conn.id}`);
          this.handlers.onDisconnect(conn);
        },
      },
      {
        idlePingMs: this.options.idlePingMs,
        maxPayload: this.options.maxPayload,
        closeTimeoutMs: this.options.closeTimeoutMs,
      },
    );

    this.connections.set(id, connection);
    console.log(`[WS] Connection established: ${id}`);
    this.handlers.onConnect(connection);
    connection.attach(pending);
  }
}
