/**
 * Actor Components
 *
 * Identity, players, AI, inventory and respawn.
 */

import type { EntityKind, FactionName } from "@ashfall/contracts";
import { defineComponent } from "@ashfall/ecs";
import { Stats } from "./stats";

export interface IdentityData {
  entityType: EntityKind;
  name: string;
  description: string;
}

export const Identity = defineComponent<IdentityData>("Identity");

export interface PlayerData {
  accountId: number;
  characterName: string;
  connectionId: string | null;
  /** Simulation seconds at the last save. */
  lastSaveTime: number;
  saveInterval: number;
}

export const Player = defineComponent<PlayerData>("Player");

export type AIStateName =
  | "idle"
  | "wandering"
  | "chasing"
  | "attacking"
  | "fleeing"
  | "returning";

export interface AIData {
  state: AIStateName;
  faction: FactionName;
  aggroRadius: number;
  chaseRadius: number;
  attackRange: number;
  spawnX: number;
  spawnY: number;
  spawnZ: number;
  currentTarget: number | null;
}

export const AI = defineComponent<AIData>("AI");

export interface InventoryItem {
  itemId: number;
  templateId: string;
  name: string;
  weight: number;
  stackCount: number;
}

/**
 * Carried items. Requires Stats.
 */
export interface InventoryData {
  items: InventoryItem[];
  gold: number;
  maxItems: number;
  maxWeight: number;
}

export const Inventory = defineComponent<InventoryData>("Inventory", {
  requires: [Stats],
});

export function createInventory(overrides: Partial<InventoryData> = {}): InventoryData {
  return { items: [], gold: 0, maxItems: 20, maxWeight: 100, ...overrides };
}

export interface RespawnData {
  x: number;
  y: number;
  z: number;
  /** Seconds until respawn. */
  delay: number;
}

export const Respawn = defineComponent<RespawnData>("Respawn");
