import { z } from "zod";

// =============================================================================
// Envelope
// =============================================================================

/**
 * Loose envelope accepted off the wire before the type is known.
 * `ts` is the short form of `timestamp`.
 */
export const RawEnvelopeSchema = z.object({
  type: z.string().min(1, { error: "Message type cannot be empty" }),
  id: z.number().int().nonnegative().optional(),
  timestamp: z.number().nonnegative().optional(),
  ts: z.number().nonnegative().optional(),
  data: z.record(z.string(), z.unknown()).optional(),
});

export type RawEnvelope = z.infer<typeof RawEnvelopeSchema>;

// =============================================================================
// Client Payloads
// =============================================================================

const EntityIdSchema = z
  .number()
  .int()
  .positive({ error: "Entity ids are positive integers" });

export const ChatChannelSchema = z.enum(["local", "global", "party"]);

export const LoginDataSchema = z.object({
  username: z.string().default(""),
  password: z.string().default(""),
});

export const RegisterDataSchema = z.object({
  username: z.string().default(""),
  password: z.string().default(""),
  email: z.string().optional(),
});

export const EmptyDataSchema = z.object({});

export const MoveDataSchema = z.object({
  dx: z.number().default(0),
  dy: z.number().default(0),
  dz: z.number().default(0),
});

export const AttackDataSchema = z.object({
  target_id: EntityIdSchema.optional(),
});

export const UseSkillDataSchema = z.object({
  skill_id: z.string().min(1, { error: "Skill id cannot be empty" }),
  target_id: EntityIdSchema.optional(),
});

export const InteractDataSchema = z.object({
  target_id: EntityIdSchema.optional(),
  x: z.number().int().optional(),
  y: z.number().int().optional(),
  z: z.number().int().optional(),
});

export const InventoryDataSchema = z.object({
  item_id: EntityIdSchema.optional(),
  slot: z.number().int().nonnegative().optional(),
});

export const ChatDataSchema = z.object({
  message: z.string().default(""),
  channel: ChatChannelSchema.default("local"),
});

export const PingDataSchema = z.object({
  ts: z.number().optional(),
});

// =============================================================================
// Client Messages
// =============================================================================

function envelope<K extends string, S extends z.ZodType>(type: K, data: S) {
  return z.object({
    type: z.literal(type),
    id: z.number().int().nonnegative(),
    timestamp: z.number().nonnegative(),
    data,
  });
}

export const ClientMessageSchema = z.discriminatedUnion("type", [
  envelope("auth_login", LoginDataSchema),
  envelope("auth_register", RegisterDataSchema),
  envelope("auth_logout", EmptyDataSchema),
  envelope("player_move", MoveDataSchema),
  envelope("player_attack", AttackDataSchema),
  envelope("player_use_skill", UseSkillDataSchema),
  envelope("player_interact", InteractDataSchema),
  envelope("inventory_use", InventoryDataSchema),
  envelope("inventory_drop", InventoryDataSchema),
  envelope("inventory_pickup", InventoryDataSchema),
  envelope("inventory_equip", InventoryDataSchema),
  envelope("inventory_unequip", InventoryDataSchema),
  envelope("chat_send", ChatDataSchema),
  envelope("request_state", EmptyDataSchema),
  envelope("ping", PingDataSchema),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ClientMessageOf<K extends ClientMessage["type"]> = Extract<
  ClientMessage,
  { type: K }
>;

export type MoveData = z.infer<typeof MoveDataSchema>;
export type ChatData = z.infer<typeof ChatDataSchema>;
export type InteractData = z.infer<typeof InteractDataSchema>;
export type InventoryData = z.infer<typeof InventoryDataSchema>;
