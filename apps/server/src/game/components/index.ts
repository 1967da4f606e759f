/**
 * Game Components
 */

import type { AnyComponentType, World } from "@ashfall/ecs";
import { AI, Identity, Inventory, Player, Respawn } from "./actor";
import { Lifetime, Sprite, Vision } from "./effects";
import { Position, Solid, Velocity } from "./spatial";
import { CombatState, Cooldowns, Dead, Stats } from "./stats";

export * from "./actor";
export * from "./effects";
export * from "./spatial";
export * from "./stats";

export const GAME_COMPONENTS: readonly AnyComponentType[] = [
  Position,
  Velocity,
  Solid,
  Identity,
  Sprite,
  Stats,
  CombatState,
  Cooldowns,
  Inventory,
  AI,
  Player,
  Respawn,
  Vision,
  Lifetime,
  Dead,
];

/**
 * Register every gameplay component with its dependencies.
 */
export function registerGameComponents(world: World): void {
  for (const type of GAME_COMPONENTS) {
    world.registerComponent(type);
  }
}
