import { z } from "zod";

// =============================================================================
// Environment
// =============================================================================

const PortSchema = z.coerce
  .number()
  .int()
  .min(1, { error: "Port must be between 1 and 65535" })
  .max(65535, { error: "Port must be between 1 and 65535" });

const PositiveInt = z.coerce.number().int().positive();

export const ServerConfigSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: PortSchema.default(8765),
  TICK_RATE: PositiveInt.max(1000, { error: "Tick rate cannot exceed 1000" }).default(20),
  SPATIAL_CELL_SIZE: z.coerce.number().positive().default(16),
  AOI_RADIUS: z.coerce.number().positive().default(30),
  VISION_RADIUS: PositiveInt.default(25),
  TICK_HISTORY: PositiveInt.default(100),
  RATE_LIMIT_PER_SECOND: PositiveInt.default(20),
  HANDSHAKE_TIMEOUT_MS: PositiveInt.default(10_000),
  IDLE_PING_MS: PositiveInt.default(30_000),
  ACTION_QUEUE_CAPACITY: PositiveInt.default(4096),
  SAVE_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  DATABASE_URL: z.url({ error: "DATABASE_URL must be a connection URL" }).optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type ServerConfig = Readonly<z.infer<typeof ServerConfigSchema>>;

export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(public readonly issues: string[]) {
    super(`Invalid server configuration:\n  - ${issues.join("\n  - ")}`);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/**
 * Parse server settings from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const input: Record<string, string> = {};
  for (const key of Object.keys(ServerConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== "") input[key] = value;
  }

  const parsed = ServerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`,
      ),
    );
  }

  return Object.freeze(parsed.data);
}

// =============================================================================
// Game Rules
// =============================================================================

export const GAME_RULES = {
  SPAWN: { x: 8, y: 8, z: 0 },

  WORLD_BOUNDS: { min: -1000, max: 1000, minZ: 0, maxZ: 100 },

  PLAYER: {
    STATS: {
      strength: 15,
      dexterity: 12,
      constitution: 14,
      maxHp: 140,
      maxMp: 50,
      level: 1,
    },
    SPRITE: { char: "@", color: "#ffff00" },
    VISION_RADIUS: 20,
    /** Seconds a dead player waits before coming back at the spawn point. */
    RESPAWN_DELAY: 5,
    DESCRIPTION: "A brave adventurer",
  },

  COMBAT: {
    MELEE_RANGE: 1.5,
    GLOBAL_COOLDOWN: 0.5,
    XP_PER_VICTIM_LEVEL: 10,
    XP_CURVE: 1.5,
    /** Seconds before a dead entity that never respawns is removed. */
    CORPSE_SECONDS: 30,
  },

  CHAT: {
    MAX_LENGTH: 500,
  },

  AUTH: {
    USERNAME_MIN: 3,
    USERNAME_MAX: 20,
  },

  WELCOME: "Welcome to Ashfall! Please login or register.",
} as const;

export type GameRules = typeof GAME_RULES;
