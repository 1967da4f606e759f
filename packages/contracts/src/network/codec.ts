import type { z } from "zod";
import {
  type ClientMessage,
  ClientMessageSchema,
  RawEnvelopeSchema,
} from "../schemas/messages";
import { MessageDecodeError, type WireErrorCode } from "../types/error";
import { Result } from "../types/result";
import {
  type AuthSuccessData,
  type ChatChannel,
  type CombatEventData,
  type DamageEventData,
  type DeathEventData,
  type EntityData,
  type GameStateData,
  type GameStateDeltaData,
  type ItemEventData,
  isClientMessageType,
  type LevelUpEventData,
  type ServerEnvelope,
  type ServerMessage,
  type ServerMessageDataMap,
  type ServerMessageType,
  type SystemMessageLevel,
  type TileMap,
} from "./protocol";

// =============================================================================
// Decoding
// =============================================================================

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Decode one text frame into a validated client message.
 *
 * Missing `id` becomes 0, missing `timestamp` (or its short form `ts`)
 * becomes `now`, missing `data` becomes `{}`.
 */
export function decodeClientMessage(
  raw: string,
  now: number = Date.now(),
): Result<ClientMessage, MessageDecodeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return Result.err(
      new MessageDecodeError("INVALID_JSON", "Message is not valid JSON", {
        cause: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const envelope = RawEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return Result.err(
      new MessageDecodeError(
        "INVALID_ENVELOPE",
        `Invalid message envelope: ${formatIssues(envelope.error)}`,
      ),
    );
  }

  const { type, id, timestamp, ts, data } = envelope.data;
  if (!isClientMessageType(type)) {
    return Result.err(
      new MessageDecodeError("UNKNOWN_TYPE", `Unknown message type: ${type}`, {
        type,
      }),
    );
  }

  const message = ClientMessageSchema.safeParse({
    type,
    id: id ?? 0,
    timestamp: timestamp ?? ts ?? now,
    data: data ?? {},
  });
  if (!message.success) {
    return Result.err(
      new MessageDecodeError(
        "INVALID_PAYLOAD",
        `Invalid ${type} payload: ${formatIssues(message.error)}`,
        { type },
      ),
    );
  }

  return Result.ok(message.data);
}

/** Serialize a message for a single text frame. */
export function encodeMessage(message: ServerMessage | ClientMessage): string {
  return JSON.stringify(message);
}

// =============================================================================
// Message Factory
// =============================================================================

export interface MessageFactoryOptions {
  /** First id handed out. Defaults to 1. */
  startId?: number;
  /** Millisecond clock used for `timestamp`. */
  clock?: () => number;
}

/**
 * Builds server → client envelopes. Each instance owns its id counter, so
 * ids are monotonic per sender.
 */
export class MessageFactory {
  private nextId: number;
  private readonly clock: () => number;

  constructor(options: MessageFactoryOptions = {}) {
    this.nextId = options.startId ?? 1;
    this.clock = options.clock ?? Date.now;
  }

  /** Id the next message will carry. */
  peekNextId(): number {
    return this.nextId;
  }

  create<K extends ServerMessageType>(
    type: K,
    data: ServerMessageDataMap[K],
  ): ServerEnvelope<K> {
    return { type, id: this.nextId++, timestamp: this.clock(), data };
  }

  authSuccess(data: AuthSuccessData): ServerEnvelope<"auth_success"> {
    return this.create("auth_success", data);
  }

  authFailure(reason: string): ServerEnvelope<"auth_failure"> {
    return this.create("auth_failure", { reason });
  }

  gameState(data: GameStateData): ServerEnvelope<"game_state"> {
    return this.create("game_state", data);
  }

  gameStateDelta(data: GameStateDeltaData): ServerEnvelope<"game_state_delta"> {
    return this.create("game_state_delta", data);
  }

  entitySpawn(entity: EntityData): ServerEnvelope<"entity_spawn"> {
    return this.create("entity_spawn", entity);
  }

  entityDespawn(entityId: number): ServerEnvelope<"entity_despawn"> {
    return this.create("entity_despawn", { entity_id: entityId });
  }

  entityUpdate(entity: EntityData): ServerEnvelope<"entity_update"> {
    return this.create("entity_update", entity);
  }

  combatEvent(data: CombatEventData): ServerEnvelope<"combat_event"> {
    return this.create("combat_event", data);
  }

  damageEvent(data: DamageEventData): ServerEnvelope<"damage_event"> {
    return this.create("damage_event", data);
  }

  deathEvent(data: DeathEventData): ServerEnvelope<"death_event"> {
    return this.create("death_event", data);
  }

  levelUpEvent(data: LevelUpEventData): ServerEnvelope<"level_up_event"> {
    return this.create("level_up_event", data);
  }

  itemDropped(data: ItemEventData): ServerEnvelope<"item_dropped"> {
    return this.create("item_dropped", data);
  }

  itemPickedUp(data: ItemEventData): ServerEnvelope<"item_picked_up"> {
    return this.create("item_picked_up", data);
  }

  chatReceive(
    senderId: number | null,
    senderName: string,
    message: string,
    channel: ChatChannel,
  ): ServerEnvelope<"chat_receive"> {
    return this.create("chat_receive", {
      sender_id: senderId,
      sender_name: senderName,
      message,
      channel,
      timestamp: this.clock(),
    });
  }

  systemMessage(
    message: string,
    level: SystemMessageLevel = "info",
  ): ServerEnvelope<"system_message"> {
    return this.create("system_message", { message, level });
  }

  worldUpdate(changedTiles: TileMap): ServerEnvelope<"world_update"> {
    return this.create("world_update", { changed_tiles: changedTiles });
  }

  pong(clientTs: number): ServerEnvelope<"pong"> {
    return this.create("pong", { client_ts: clientTs, server_ts: this.clock() });
  }

  error(code: WireErrorCode, message: string): ServerEnvelope<"error"> {
    return this.create("error", { code, message });
  }
}
