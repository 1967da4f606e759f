/**
 * Game Session
 *
 * Per-connection state: authentication progress, the bound player entity,
 * the last area of interest sent, and message accounting.
 */

import type { Entity } from "@ashfall/ecs";
import { RateLimiter } from "./rate-limiter";

/**
 * `connected → authenticating → authenticated → in_game → disconnecting`.
 * A failed login returns to `connected`.
 */
export type SessionState =
  | "connected"
  | "authenticating"
  | "authenticated"
  | "in_game"
  | "disconnecting";

/**
 * Transport side of a session. Sending never throws for a closed peer.
 */
export interface ClientConnection {
  readonly id: string;
  send(text: string): void;
  close(): void;
}

export class GameSession {
  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  public state: SessionState = "connected";

  public accountId: number | null = null;

  public username: string | null = null;

  /** Player entity, set once the session is in game. */
  public entity: Entity | null = null;

  // ---------------------------------------------------------------------------
  // Delta Tracking
  // ---------------------------------------------------------------------------

  /** Entities included in the last delta, for computing removals. */
  public lastAoi: Set<Entity> = new Set();

  // ---------------------------------------------------------------------------
  // Accounting
  // ---------------------------------------------------------------------------

  public readonly connectedAt: number;

  public lastMessageAt: number;

  public messagesReceived = 0;

  public messagesSent = 0;

  public readonly rateLimiter: RateLimiter;

  constructor(
    public readonly connection: ClientConnection,
    rateLimit: number,
    now: number,
  ) {
    this.rateLimiter = new RateLimiter(rateLimit);
    this.connectedAt = now;
    this.lastMessageAt = now;
  }

  get id(): string {
    return this.connection.id;
  }

  get inGame(): boolean {
    return this.state === "in_game" && this.entity !== null;
  }
}
