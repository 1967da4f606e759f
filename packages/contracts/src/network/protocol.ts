/**
 * Network Protocol Types (Shared)
 *
 * Message envelope and payload types exchanged between client and server.
 * One JSON envelope travels per text frame:
 *
 * ```json
 * { "type": "player_move", "id": 7, "timestamp": 1700000000000, "data": { "dx": 1, "dy": 0, "dz": 0 } }
 * ```
 *
 * Client payloads are validated by the schemas in `schemas/messages.ts`;
 * server payloads are built by `MessageFactory`.
 */

// =============================================================================
// Protocol Version
// =============================================================================

/**
 * Current protocol version.
 * Increment when making breaking changes to the protocol.
 */
export const PROTOCOL_VERSION = 1;

// =============================================================================
// Message Types
// =============================================================================

export const MessageType = {
  // Client → Server
  AuthLogin: "auth_login",
  AuthRegister: "auth_register",
  AuthLogout: "auth_logout",
  PlayerMove: "player_move",
  PlayerAttack: "player_attack",
  PlayerUseSkill: "player_use_skill",
  PlayerInteract: "player_interact",
  InventoryUse: "inventory_use",
  InventoryDrop: "inventory_drop",
  InventoryPickup: "inventory_pickup",
  InventoryEquip: "inventory_equip",
  InventoryUnequip: "inventory_unequip",
  ChatSend: "chat_send",
  RequestState: "request_state",
  Ping: "ping",

  // Server → Client
  AuthSuccess: "auth_success",
  AuthFailure: "auth_failure",
  GameState: "game_state",
  GameStateDelta: "game_state_delta",
  EntitySpawn: "entity_spawn",
  EntityDespawn: "entity_despawn",
  EntityUpdate: "entity_update",
  CombatEvent: "combat_event",
  DamageEvent: "damage_event",
  DeathEvent: "death_event",
  LevelUpEvent: "level_up_event",
  ItemDropped: "item_dropped",
  ItemPickedUp: "item_picked_up",
  ChatReceive: "chat_receive",
  SystemMessage: "system_message",
  WorldUpdate: "world_update",
  Pong: "pong",
  Error: "error",
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export const CLIENT_MESSAGE_TYPES = [
  MessageType.AuthLogin,
  MessageType.AuthRegister,
  MessageType.AuthLogout,
  MessageType.PlayerMove,
  MessageType.PlayerAttack,
  MessageType.PlayerUseSkill,
  MessageType.PlayerInteract,
  MessageType.InventoryUse,
  MessageType.InventoryDrop,
  MessageType.InventoryPickup,
  MessageType.InventoryEquip,
  MessageType.InventoryUnequip,
  MessageType.ChatSend,
  MessageType.RequestState,
  MessageType.Ping,
] as const;

export type ClientMessageType = (typeof CLIENT_MESSAGE_TYPES)[number];

const CLIENT_TYPE_SET: ReadonlySet<string> = new Set(CLIENT_MESSAGE_TYPES);

export function isClientMessageType(type: string): type is ClientMessageType {
  return CLIENT_TYPE_SET.has(type);
}

export type ServerMessageType = Exclude<MessageType, ClientMessageType>;

// =============================================================================
// Envelope
// =============================================================================

export interface Envelope<TType extends string, TData> {
  type: TType;
  /** Sender-assigned, monotonically increasing per sender. */
  id: number;
  /** Milliseconds since the Unix epoch. */
  timestamp: number;
  data: TData;
}

// =============================================================================
// Shared Payload Types
// =============================================================================

export type EntityKind =
  | "player"
  | "npc"
  | "item"
  | "projectile"
  | "effect"
  | "structure";

export type FactionName =
  | "player"
  | "friendly"
  | "neutral"
  | "hostile"
  | "wildlife";

/**
 * Serialized entity as sent in snapshots, deltas and spawn messages.
 */
export interface EntityData {
  entity_id: number;
  entity_type: EntityKind;
  name: string;
  x: number;
  y: number;
  z: number;
  char: string;
  color: string;
  hp: number | null;
  max_hp: number | null;
  level: number | null;
  faction: FactionName | null;
}

export interface TileData {
  char: string;
  color: string;
  walkable: boolean;
  solid: boolean;
}

/** Keyed by `"x,y,z"`. */
export type TileMap = Record<string, TileData>;

export function tileKey(x: number, y: number, z: number): string {
  return `${x},${y},${z}`;
}

export type ChatChannel = "local" | "global" | "party";

export type SystemMessageLevel = "info" | "warning" | "error";

// =============================================================================
// Server → Client Payloads
// =============================================================================

export interface AuthSuccessData {
  player_id: number;
  character_name: string;
  spawn_x: number;
  spawn_y: number;
  spawn_z: number;
}

export interface AuthFailureData {
  reason: string;
}

export interface ChatLine {
  sender_name: string;
  message: string;
  channel: ChatChannel;
  timestamp: number;
}

export interface GameStateData {
  tick: number;
  player: EntityData;
  entities: EntityData[];
  world_tiles: TileMap;
  messages: ChatLine[];
}

export interface CombatEventData {
  attacker_id: number;
  defender_id: number;
  damage: number;
  damage_type: string;
  hit: boolean;
  critical: boolean;
}

export interface DamageEventData {
  target_id: number;
  source_id: number | null;
  amount: number;
  damage_type: string;
  current_hp: number;
  max_hp: number;
}

export interface DeathEventData {
  entity_id: number;
  killer_id: number | null;
  entity_name: string;
  killer_name: string | null;
}

export interface LevelUpEventData {
  entity_id: number;
  new_level: number;
  stat_gains: Record<string, number>;
}

export interface ItemEventData {
  item_id: number;
  item_name: string;
  item_char: string;
  item_color: string;
  x: number;
  y: number;
  z: number;
}

/** Gameplay event produced during a tick and carried by the next delta. */
export type GameEvent =
  | { type: "combat_event"; data: CombatEventData }
  | { type: "damage_event"; data: DamageEventData }
  | { type: "death_event"; data: DeathEventData }
  | { type: "level_up_event"; data: LevelUpEventData }
  | { type: "item_dropped"; data: ItemEventData }
  | { type: "item_picked_up"; data: ItemEventData };

export interface GameStateDeltaData {
  tick: number;
  changed_entities: EntityData[];
  removed_entities: number[];
  changed_tiles: TileMap;
  events: GameEvent[];
}

export interface EntityDespawnData {
  entity_id: number;
}

export interface ChatReceiveData {
  sender_id: number | null;
  sender_name: string;
  message: string;
  channel: ChatChannel;
  timestamp: number;
}

export interface SystemMessageData {
  message: string;
  level: SystemMessageLevel;
}

export interface WorldUpdateData {
  changed_tiles: TileMap;
}

export interface PongData {
  client_ts: number;
  server_ts: number;
}

export interface ErrorData {
  code: string;
  message: string;
}

export interface ServerMessageDataMap {
  auth_success: AuthSuccessData;
  auth_failure: AuthFailureData;
  game_state: GameStateData;
  game_state_delta: GameStateDeltaData;
  entity_spawn: EntityData;
  entity_despawn: EntityDespawnData;
  entity_update: EntityData;
  combat_event: CombatEventData;
  damage_event: DamageEventData;
  death_event: DeathEventData;
  level_up_event: LevelUpEventData;
  item_dropped: ItemEventData;
  item_picked_up: ItemEventData;
  chat_receive: ChatReceiveData;
  system_message: SystemMessageData;
  world_update: WorldUpdateData;
  pong: PongData;
  error: ErrorData;
}

export type ServerEnvelope<K extends ServerMessageType> = Envelope<
  K,
  ServerMessageDataMap[K]
>;

export type ServerMessage = {
  [K in ServerMessageType]: ServerEnvelope<K>;
}[ServerMessageType];
