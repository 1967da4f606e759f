import type { Duplex } from "node:stream";
import { ProtocolError } from "@ashfall/contracts";
import {
  DEFAULT_MAX_PAYLOAD,
  encodeFrame,
  type Frame,
  type FrameParseResult,
  Opcode,
  parseFrame,
} from "./frame";

// =============================================================================
// Types
// =============================================================================

export interface ConnectionOptions {
  /** Silence after which a liveness ping is sent. */
  idlePingMs: number;
  /** Applies to a single frame and to a reassembled fragmented message. */
  maxPayload?: number;
  /** How long a closing socket may wait for the peer's FIN before it is destroyed. */
  closeTimeoutMs?: number;
}

export interface ConnectionHandlers {
  onMessage(connection: WebSocketConnection, text: string): void;
  /** Called exactly once, however the connection ended. */
  onClose(connection: WebSocketConnection): void;
}

export const IDLE_PING_PAYLOAD = "ping";
export const DEFAULT_CLOSE_TIMEOUT_MS = 1_000;

// =============================================================================
// WebSocketConnection
// =============================================================================

/**
 * One upgraded socket. Buffers partial frames, answers control frames and
 * hands complete text messages to its handlers.
 */
export class WebSocketConnection {
  private buffer: Buffer = Buffer.alloc(0);
  private fragments: Buffer[] = [];
  private fragmentOpcode: Opcode | null = null;
  private fragmentBytes = 0;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private closeTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private readonly maxPayload: number;

  messagesSent = 0;
  messagesReceived = 0;

  constructor(
    readonly id: string,
    private readonly socket: Duplex,
    private readonly handlers: ConnectionHandlers,
    private readonly options: ConnectionOptions,
  ) {
    this.maxPayload = options.maxPayload ?? DEFAULT_MAX_PAYLOAD;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Start reading. `pending` holds bytes that arrived with the handshake.
   */
  attach(pending?: Buffer): void {
    this.socket.on("data", (chunk: Buffer) => this.feed(chunk));
    this.socket.on("close", () => {
      if (this.closeTimer) {
        clearTimeout(this.closeTimer);
        this.closeTimer = null;
      }
      this.finalize();
    });
    this.socket.on("error", (error: Error) => {
      console.error(`[WS] Socket error on ${this.id}:`, error);
      this.socket.destroy();
    });
    this.armIdleTimer();
    if (pending && pending.length > 0) this.feed(pending);
  }

  /**
   * Append raw bytes and dispatch every complete frame.
   */
  feed(chunk: Buffer): void {
    if (this.closed) return;
    this.armIdleTimer();
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (!this.closed) {
      try {
        const result: FrameParseResult = parseFrame(this.buffer, this.maxPayload);
        if (result.status === "incomplete") return;
        this.buffer = this.buffer.subarray(result.consumed);
        this.handleFrame(result.frame);
      } catch (error) {
        if (!ProtocolError.isProtocolError(error)) throw error;
        console.warn(`[WS] Protocol error on ${this.id}: ${error.message}`);
        this.close();
        return;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  /**
   * Queue a text frame. Never throws; a failed write closes this connection
   * only.
   */
  send(text: string): void {
    if (this.closed) return;
    this.messagesSent++;
    this.write(encodeFrame(Opcode.Text, text));
  }

  ping(payload: string = IDLE_PING_PAYLOAD): void {
    if (this.closed) return;
    this.write(encodeFrame(Opcode.Ping, payload));
  }

  /**
   * Send a close frame and end the socket. Idempotent. `payload` carries
   * the status code when echoing a peer's close. A peer that never closes
   * its side is destroyed after `closeTimeoutMs`.
   */
  close(payload?: Buffer): void {
    if (this.closed) return;
    this.write(encodeFrame(Opcode.Close, payload));
    this.socket.end();
    this.closeTimer = setTimeout(() => {
      this.closeTimer = null;
      this.socket.destroy();
    }, this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS);
    this.closeTimer.unref();
    this.finalize();
  }

  private write(frame: Buffer): void {
    this.socket.write(frame, (error?: Error | null) => {
      if (!error) return;
      console.error(`[WS] Write failed on ${this.id}:`, error);
      this.socket.destroy();
      this.finalize();
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  private handleFrame(frame: Frame): void {
    switch (frame.opcode) {
      case Opcode.Text:
      case Opcode.Binary:
        if (this.fragmentOpcode !== null) {
          throw ProtocolError.frameMalformed("Data frame inside a fragmented message", {
            opcode: frame.opcode,
          });
        }
        if (frame.fin) {
          this.deliver(frame.payload);
        } else {
          this.fragmentOpcode = frame.opcode;
          this.fragments = [frame.payload];
          this.fragmentBytes = frame.payload.length;
        }
        return;

      case Opcode.Continuation:
        if (this.fragmentOpcode === null) {
          throw ProtocolError.frameMalformed("Continuation without a started message");
        }
        this.fragmentBytes += frame.payload.length;
        if (this.fragmentBytes > this.maxPayload) {
          throw ProtocolError.frameTooLarge(this.fragmentBytes, this.maxPayload);
        }
        this.fragments.push(frame.payload);
        if (frame.fin) {
          const message = Buffer.concat(this.fragments);
          this.fragments = [];
          this.fragmentOpcode = null;
          this.fragmentBytes = 0;
          this.deliver(message);
        }
        return;

      case Opcode.Ping:
        this.write(encodeFrame(Opcode.Pong, frame.payload));
        return;

      case Opcode.Pong:
        return;

      case Opcode.Close:
        this.close(frame.payload);
        return;
    }
  }

  private deliver(payload: Buffer): void {
    this.messagesReceived++;
    this.handlers.onMessage(this, payload.toString("utf8"));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  private armIdleTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = setTimeout(() => {
      this.ping();
      this.armIdleTimer();
    }, this.options.idlePingMs);
    this.idleTimer.unref();
  }

  private finalize(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
    this.buffer = Buffer.alloc(0);
    this.fragments = [];
    this.handlers.onClose(this);
  }
}
