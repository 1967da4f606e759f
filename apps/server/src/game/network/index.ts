/**
 * Network Module
 *
 * Sessions, action routing, state synchronization and broadcast.
 *
 * @example
 * ```typescript
 * import { GameServer } from "./game/network";
 *
 * const gameServer = new GameServer({ loop, accounts, characters, config });
 *
 * gameServer.handleConnect(connection);
 * await gameServer.handleMessage(connection, text);
 * gameServer.handleDisconnect(connection.id);
 * ```
 */

// =============================================================================
// Action Queue
// =============================================================================

export { ActionQueue, type PlayerAction } from "./action-queue";

// =============================================================================
// Game Session
// =============================================================================

export {
  type ClientConnection,
  GameSession,
  type SessionState,
} from "./game-session";
export { RateLimiter } from "./rate-limiter";

// =============================================================================
// Network Sync Manager
// =============================================================================

export { NetworkSyncManager, type SyncOptions } from "./sync-manager";

// =============================================================================
// Message Handler
// =============================================================================

export { type ActionFeedback, MessageHandler } from "./message-handler";

// =============================================================================
// Game Server
// =============================================================================

export {
  GameServer,
  type GameServerConfig,
  type GameServerOptions,
  type GameServerStats,
} from "./game-server";
