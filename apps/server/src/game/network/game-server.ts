/**
 * Game Server
 *
 * Coordinates client sessions with the simulation. Connection handlers run
 * whenever the transport delivers a message; anything that changes the
 * world in response to a player goes through the action queue and is
 * applied at the start of the next tick. Deltas go out at the end of each
 * tick, synchronously, so a client never sees tick N before tick N - 1.
 */

import {
  type ChatChannel,
  type ClientMessage,
  type ClientMessageOf,
  decodeClientMessage,
  encodeMessage,
  MessageFactory,
  type ServerMessage,
  type SystemMessageLevel,
  type WireErrorCode,
} from "@ashfall/contracts";
import type { Entity, GameLoop, World } from "@ashfall/ecs";
import { GAME_RULES, type ServerConfig } from "../../config";
import type { AccountStore, CharacterRecord, CharacterRepository } from "../../infra/repositories";
import { Player, Position } from "../components";
import { despawnEntity, snapshotCharacter, spawnPlayer, toEntityData } from "../player";
import { TickEventsResource } from "../resources";
import { ActionQueue, type PlayerAction } from "./action-queue";
import { type ClientConnection, GameSession } from "./game-session";
import { MessageHandler } from "./message-handler";
import { NetworkSyncManager } from "./sync-manager";

// =============================================================================
// Types
// =============================================================================

export type GameServerConfig = Pick<
  ServerConfig,
  | "AOI_RADIUS"
  | "VISION_RADIUS"
  | "RATE_LIMIT_PER_SECOND"
  | "ACTION_QUEUE_CAPACITY"
  | "SAVE_INTERVAL_SECONDS"
>;

export interface GameServerOptions {
  loop: GameLoop;
  accounts: AccountStore;
  characters: CharacterRepository;
  config: GameServerConfig;
  /** Millisecond clock for rate limiting and message timestamps. */
  clock?: () => number;
}

export interface GameServerStats {
  connections: number;
  playersInGame: number;
  queuedActions: number;
  tick: number;
}

/** An action as routed, before the session fills in who sent it. */
type QueuedAction = PlayerAction extends infer A
  ? A extends unknown
    ? Omit<A, "connectionId" | "entity" | "receivedAt">
    : never
  : never;

function clampStep(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

// =============================================================================
// GameServer Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const server = new GameServer({ loop, accounts, characters, config });
 *
 * const ws = new WebSocketServer(options, {
 *   onConnect: (conn) => server.handleConnect(conn),
 *   onMessage: (conn, text) => server.handleMessage(conn, text),
 *   onDisconnect: (conn) => server.handleDisconnect(conn.id),
 * });
 * ```
 */
export class GameServer {
  private readonly world: World;
  private readonly loop: GameLoop;
  private readonly accounts: AccountStore;
  private readonly characters: CharacterRepository;
  private readonly config: GameServerConfig;
  private readonly clock: () => number;

  private readonly messages: MessageFactory;
  private readonly queue: ActionQueue;
  private readonly syncManager: NetworkSyncManager;
  private readonly messageHandler: MessageHandler;

  /** Sessions by connection id. */
  private readonly sessions = new Map<string, GameSession>();

  /**
   * Account id → connection id. Claimed synchronously once credentials
   * check out, so two concurrent logins for one account cannot both pass.
   */
  private readonly claimedAccounts = new Map<number, string>();

  private readonly pendingSaves = new Set<Promise<void>>();
  private readonly unsubscribe: Array<() => void>;

  // ---------------------------------------------------------------------------
  // Constructor
  // ---------------------------------------------------------------------------

  constructor(options: GameServerOptions) {
    this.loop = options.loop;
    this.world = options.loop.world;
    this.accounts = options.accounts;
    this.characters = options.characters;
    this.config = options.config;
    this.clock = options.clock ?? Date.now;

    this.messages = new MessageFactory({ clock: this.clock });
    this.queue = new ActionQueue(this.config.ACTION_QUEUE_CAPACITY);
    this.syncManager = new NetworkSyncManager(this.world, {
      aoiRadius: this.config.AOI_RADIUS,
      visionRadius: this.config.VISION_RADIUS,
    });
    this.messageHandler = new MessageHandler(this.world, (connectionId, message, level) =>
      this.notify(connectionId, message, level),
    );

    this.unsubscribe = [
      this.loop.onTickStart((tick) => this.onTickStart(tick)),
      this.loop.onTickEnd((tick) => this.onTickEnd(tick)),
    ];
  }

  // ---------------------------------------------------------------------------
  // Connection Handling
  // ---------------------------------------------------------------------------

  handleConnect(connection: ClientConnection): void {
    const session = new GameSession(
      connection,
      this.config.RATE_LIMIT_PER_SECOND,
      this.clock(),
    );
    this.sessions.set(connection.id, session);
    console.log(`[GameServer] Client connected: ${connection.id}`);

    this.send(session, this.messages.systemMessage(GAME_RULES.WELCOME));
  }

  /**
   * Decode, rate-limit and route one text message. Resolves once any
   * collaborator call it triggered has settled.
   */
  async handleMessage(connection: ClientConnection, text: string): Promise<void> {
    const session = this.sessions.get(connection.id);
    if (!session || session.state === "disconnecting") return;

    const now = this.clock();
    session.lastMessageAt = now;
    session.messagesReceived++;

    const decoded = decodeClientMessage(text, now);
    const message = decoded.value;
    if (message === undefined) {
      const reason = decoded.error?.message ?? "Invalid message";
      console.warn(`[GameServer] Rejected message from ${connection.id}: ${reason}`);
      this.sendError(session, "INVALID_MESSAGE", reason);
      return;
    }

    if (!session.rateLimiter.tryAcquire(now)) {
      this.sendError(session, "RATE_LIMITED", "Too many messages");
      return;
    }

    try {
      await this.route(session, message);
    } catch (error) {
      console.error(`[GameServer] Failed to handle ${message.type} from ${connection.id}:`, error);
      this.sendError(session, "INTERNAL_ERROR", "Internal server error");
    }
  }

  /**
   * Tear a session down. Safe to call more than once.
   */
  handleDisconnect(connectionId: string): void {
    const session = this.sessions.get(connectionId);
    if (!session) return;

    this.sessions.delete(connectionId);
    session.state = "disconnecting";

    const entity = session.entity;
    if (entity !== null && this.ownsEntity(session, entity)) {
      const record = snapshotCharacter(this.world, entity);
      if (record) this.trackSave(record);

      this.broadcast(this.messages.entityDespawn(entity));
      despawnEntity(this.world, entity);
    }
    session.entity = null;

    if (session.accountId !== null && this.claimedAccounts.get(session.accountId) === connectionId) {
      this.claimedAccounts.delete(session.accountId);
    }

    console.log(
      `[GameServer] Client disconnected: ${session.username ?? "anonymous"} (${connectionId})`,
    );
  }

  // ---------------------------------------------------------------------------
  // Routing
  // ---------------------------------------------------------------------------

  private async route(session: GameSession, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case "auth_login":
        return this.handleLogin(session, message);
      case "auth_register":
        return this.handleRegister(session, message);
      case "auth_logout":
        this.handleLogout(session);
        return;
      case "player_move": {
        const { dx, dy, dz } = message.data;
        this.enqueue(session, {
          kind: "move",
          dx: clampStep(dx),
          dy: clampStep(dy),
          dz: clampStep(dz),
        });
        return;
      }
      case "player_attack": {
        if (!this.requireInGame(session)) return;
        const targetId = message.data.target_id;
        if (targetId === undefined) {
          this.sendError(session, "INVALID_MESSAGE", "Attack requires target_id");
          return;
        }
        this.enqueue(session, { kind: "attack", targetId });
        return;
      }
      case "player_interact":
        this.enqueue(session, { kind: "interact", data: message.data });
        return;
      case "inventory_pickup":
        this.enqueue(session, { kind: "pickup", data: message.data });
        return;
      case "player_use_skill":
      case "inventory_use":
      case "inventory_drop":
      case "inventory_equip":
      case "inventory_unequip":
        if (!this.requireInGame(session)) return;
        this.send(
          session,
          this.messages.systemMessage(`${message.type} is not available yet.`, "warning"),
        );
        return;
      case "chat_send":
        this.handleChat(session, message);
        return;
      case "request_state":
        if (!this.requireInGame(session)) return;
        this.sendFullState(session);
        return;
      case "ping":
        this.send(session, this.messages.pong(message.data.ts ?? 0));
        return;
    }
  }

  // ---------------------------------------------------------------------------
  // Authentication
  // ---------------------------------------------------------------------------

  private async handleLogin(
    session: GameSession,
    message: ClientMessageOf<"auth_login">,
  ): Promise<void> {
    const { username, password } = message.data;
    if (!username || !password) {
      this.send(session, this.messages.authFailure("Missing username or password"));
      return;
    }
    if (session.state !== "connected") {
      this.send(session, this.messages.authFailure("Already logged in"));
      return;
    }

    session.state = "authenticating";
    let verified: Awaited<ReturnType<AccountStore["verify"]>>;
    try {
      verified = await this.accounts.verify(username, password);
    } catch (error) {
      console.error(`[GameServer] Credential check failed for ${username}:`, error);
      if (this.isLive(session)) {
        session.state = "connected";
        this.send(session, this.messages.authFailure("Login failed"));
      }
      return;
    }
    if (!this.isLive(session)) return;

    const account = verified.value;
    if (account === undefined) {
      session.state = "connected";
      this.send(
        session,
        this.messages.authFailure(verified.error?.message ?? "Invalid credentials"),
      );
      return;
    }

    if (this.claimedAccounts.has(account.id)) {
      session.state = "connected";
      console.warn(`[GameServer] Duplicate login for ${account.username} from ${session.id}`);
      this.send(session, this.messages.authFailure("Already logged in"));
      return;
    }
    this.claimedAccounts.set(account.id, session.id);
    session.accountId = account.id;
    session.username = account.username;
    session.state = "authenticated";

    let saved: CharacterRecord | null = null;
    try {
      saved = await this.characters.load(account.id);
    } catch (error) {
      console.error(`[GameServer] Failed to load character for ${account.username}:`, error);
    }
    // A disconnect while loading has already released the claim.
    if (!this.isLive(session)) return;

    const entity = spawnPlayer(this.world, {
      accountId: account.id,
      name: saved?.name ?? account.username,
      connectionId: session.id,
      saveIntervalSeconds: this.config.SAVE_INTERVAL_SECONDS,
      saved,
    });
    session.entity = entity;
    session.state = "in_game";

    const pos = this.world.getComponent(entity, Position);
    this.send(
      session,
      this.messages.authSuccess({
        player_id: entity,
        character_name: saved?.name ?? account.username,
        spawn_x: pos?.x ?? GAME_RULES.SPAWN.x,
        spawn_y: pos?.y ?? GAME_RULES.SPAWN.y,
        spawn_z: pos?.z ?? GAME_RULES.SPAWN.z,
      }),
    );
    this.sendFullState(session);

    const data = toEntityData(this.world, entity);
    if (data) this.broadcast(this.messages.entitySpawn(data), session.id);

    console.log(`[GameServer] ${account.username} entered the game as entity ${entity}`);
  }

  private async handleRegister(
    session: GameSession,
    message: ClientMessageOf<"auth_register">,
  ): Promise<void> {
    const { username, password } = message.data;
    if (!username || !password) {
      this.send(session, this.messages.authFailure("Missing required fields"));
      return;
    }

    const { USERNAME_MIN, USERNAME_MAX } = GAME_RULES.AUTH;
    if (username.length < USERNAME_MIN || username.length > USERNAME_MAX) {
      this.send(
        session,
        this.messages.authFailure(`Username must be ${USERNAME_MIN}-${USERNAME_MAX} characters`),
      );
      return;
    }

    let registered: Awaited<ReturnType<AccountStore["register"]>>;
    try {
      registered = await this.accounts.register(username, password);
    } catch (error) {
      console.error(`[GameServer] Registration failed for ${username}:`, error);
      if (this.isLive(session)) {
        this.send(session, this.messages.authFailure("Registration failed"));
      }
      return;
    }
    if (!this.isLive(session)) return;

    registered.match({
      ok: (account) => {
        console.log(`[GameServer] Registered account ${account.username}`);
        this.send(
          session,
          this.messages.systemMessage(
            `Account created! You can now login as ${account.username}.`,
          ),
        );
      },
      err: (error) => this.send(session, this.messages.authFailure(error.message)),
    });
  }

  private handleLogout(session: GameSession): void {
    this.handleDisconnect(session.id);
    session.connection.close();
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  private requireInGame(session: GameSession): session is GameSession & { entity: Entity } {
    if (session.inGame) return true;
    this.sendError(session, "NOT_IN_GAME", "You must be in game to do that");
    return false;
  }

  private enqueue(session: GameSession, action: QueuedAction): void {
    if (!this.requireInGame(session)) return;

    const accepted = this.queue.push({
      ...action,
      connectionId: session.id,
      entity: session.entity,
      receivedAt: this.clock(),
    });
    if (!accepted) {
      console.warn(`[GameServer] Action queue full, dropped ${action.kind} from ${session.id}`);
      this.sendError(session, "QUEUE_FULL", "Server is busy, action dropped");
    }
  }

  // ---------------------------------------------------------------------------
  // Chat
  // ---------------------------------------------------------------------------

  private handleChat(session: GameSession, message: ClientMessageOf<"chat_send">): void {
    if (!this.requireInGame(session)) return;

    const text = message.data.message.trim().slice(0, GAME_RULES.CHAT.MAX_LENGTH);
    if (!text) return;

    const channel: ChatChannel = message.data.channel;
    const senderName = session.username ?? "unknown";
    const chat = this.messages.chatReceive(session.entity, senderName, text, channel);

    if (channel === "local") {
      const origin = this.world.getComponent(session.entity, Position);
      if (!origin) return;
      for (const recipient of this.sessions.values()) {
        if (
          recipient.entity !== null &&
          recipient.inGame &&
          this.syncManager.isInAreaOfInterest(recipient.entity, origin)
        ) {
          this.send(recipient, chat);
        }
      }
      return;
    }

    this.syncManager.recordChat({
      sender_name: senderName,
      message: text,
      channel,
      timestamp: chat.data.timestamp,
    });
    this.broadcast(chat);
  }

  // ---------------------------------------------------------------------------
  // Tick Hooks
  // ---------------------------------------------------------------------------

  private onTickStart(_tick: number): void {
    const actions = this.queue.drain();
    if (actions.length > 0) this.messageHandler.applyActions(actions);
  }

  private onTickEnd(tick: number): void {
    const events = this.world.resources.get(TickEventsResource)?.drain() ?? [];

    for (const session of this.sessions.values()) {
      if (!session.inGame) continue;
      try {
        const delta = this.syncManager.getStateDelta(session, tick, events);
        if (delta) this.send(session, this.messages.gameStateDelta(delta));
      } catch (error) {
        console.error(`[GameServer] Failed to build delta for ${session.id}:`, error);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Sending
  // ---------------------------------------------------------------------------

  private sendFullState(session: GameSession): void {
    const state = this.syncManager.getFullState(session, this.loop.currentTick);
    if (!state) {
      this.sendError(session, "INTERNAL_ERROR", "Failed to build game state");
      return;
    }
    this.send(session, this.messages.gameState(state));
  }

  private send(session: GameSession, message: ServerMessage): void {
    this.sendText(session, encodeMessage(message));
  }

  private sendText(session: GameSession, text: string): void {
    try {
      session.connection.send(text);
      session.messagesSent++;
    } catch (error) {
      console.error(`[GameServer] Failed to send to ${session.id}:`, error);
    }
  }

  private sendError(session: GameSession, code: WireErrorCode, message: string): void {
    this.send(session, this.messages.error(code, message));
  }

  /** Encode once, send to every in-game session except `exclude`. */
  private broadcast(message: ServerMessage, exclude?: string): void {
    const text = encodeMessage(message);
    for (const session of this.sessions.values()) {
      if (session.id === exclude || !session.inGame) continue;
      this.sendText(session, text);
    }
  }

  private notify(connectionId: string, message: string, level: SystemMessageLevel): void {
    const session = this.sessions.get(connectionId);
    if (session) this.send(session, this.messages.systemMessage(message, level));
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  private trackSave(record: CharacterRecord): void {
    const pending: Promise<void> = this.characters
      .save(record)
      .catch((error: unknown) => {
        console.error(`[GameServer] Failed to save ${record.name}:`, error);
      })
      .finally(() => {
        this.pendingSaves.delete(pending);
      });
    this.pendingSaves.add(pending);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private isLive(session: GameSession): boolean {
    return this.sessions.get(session.id) === session && session.state !== "disconnecting";
  }

  private ownsEntity(session: GameSession, entity: Entity): boolean {
    return (
      this.world.isAlive(entity) &&
      this.world.getComponent(entity, Player)?.connectionId === session.id
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Disconnect everyone and wait for their saves. The loop should already
   * be stopped.
   */
  async shutdown(): Promise<void> {
    for (const off of this.unsubscribe) off();

    for (const session of [...this.sessions.values()]) {
      this.handleDisconnect(session.id);
      session.connection.close();
    }
    await Promise.all(this.pendingSaves);
    console.log("[GameServer] Shut down");
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getStats(): GameServerStats {
    let playersInGame = 0;
    for (const session of this.sessions.values()) {
      if (session.inGame) playersInGame++;
    }
    return {
      connections: this.sessions.size,
      playersInGame,
      queuedActions: this.queue.size,
      tick: this.loop.currentTick,
    };
  }

  getSession(connectionId: string): GameSession | undefined {
    return this.sessions.get(connectionId);
  }

  getSyncManager(): NetworkSyncManager {
    return this.syncManager;
  }
}
