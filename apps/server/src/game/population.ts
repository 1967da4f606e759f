/**
 * World Population
 *
 * The creatures and ground items a fresh world starts with, read from a
 * JSON file beside the map.
 */

import { readFileSync } from "node:fs";
import type { Entity, World } from "@ashfall/ecs";
import { z } from "zod";
import {
  AI,
  CombatState,
  Cooldowns,
  createCombatState,
  createCooldowns,
  createSprite,
  createStats,
  Identity,
  Position,
  Respawn,
  Solid,
  Sprite,
  Stats,
  Velocity,
} from "./components";
import { SpatialIndexResource, TerrainResource } from "./resources";

// =============================================================================
// Schema
// =============================================================================

const Coordinates = {
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int().min(0).default(0),
};

const CreatureSchema = z.object({
  name: z.string().min(1),
  char: z.string().length(1),
  color: z.string().min(1),
  description: z.string().default(""),
  faction: z.enum(["friendly", "neutral", "hostile", "wildlife"]),
  state: z.enum(["idle", "wandering"]).default("idle"),
  level: z.number().int().positive().default(1),
  hp: z.number().int().positive(),
  attack: z.number().int().nonnegative(),
  armor: z.number().int().nonnegative().default(0),
  moveSpeed: z.number().positive().default(3),
  aggroRadius: z.number().nonnegative().default(0),
  attackRange: z.number().positive().default(1.5),
  /** Omitted for creatures that stay dead. */
  respawnSeconds: z.number().positive().optional(),
  ...Coordinates,
});

const GroundItemSchema = z.object({
  name: z.string().min(1),
  char: z.string().length(1),
  color: z.string().min(1),
  description: z.string().default(""),
  ...Coordinates,
});

export const WorldPopulationSchema = z.object({
  creatures: z.array(CreatureSchema).default([]),
  items: z.array(GroundItemSchema).default([]),
});

export type CreatureSpawn = z.infer<typeof CreatureSchema>;
export type GroundItemSpawn = z.infer<typeof GroundItemSchema>;
export type WorldPopulation = z.infer<typeof WorldPopulationSchema>;

export function loadPopulation(path: string): WorldPopulation {
  return WorldPopulationSchema.parse(JSON.parse(readFileSync(path, "utf8")));
}

// =============================================================================
// Spawning
// =============================================================================

export function spawnCreature(world: World, spawn: CreatureSpawn): Entity {
  const { x, y, z: level } = spawn;
  const stats = createStats({
    level: spawn.level,
    maxHp: spawn.hp,
    maxMp: 0,
    attackPower: spawn.attack,
    armor: spawn.armor,
    moveSpeed: spawn.moveSpeed,
  });

  const entity = world.createEntity();
  world.addComponent(entity, Position, { x, y, z: level });
  world.addComponent(entity, Velocity, { dx: 0, dy: 0, dz: 0 });
  world.addComponent(entity, Solid, { blocksMovement: true, blocksProjectiles: true });
  world.addComponent(entity, Stats, stats);
  world.addComponent(entity, CombatState, createCombatState(spawn.hp, 0));
  world.addComponent(entity, Cooldowns, createCooldowns());
  world.addComponent(entity, Sprite, createSprite(spawn.char, spawn.color));
  world.addComponent(entity, Identity, {
    entityType: "npc",
    name: spawn.name,
    description: spawn.description,
  });
  world.addComponent(entity, AI, {
    state: spawn.state,
    faction: spawn.faction,
    aggroRadius: spawn.aggroRadius,
    chaseRadius: spawn.aggroRadius * 2,
    attackRange: spawn.attackRange,
    spawnX: x,
    spawnY: y,
    spawnZ: level,
    currentTarget: null,
  });
  if (spawn.respawnSeconds !== undefined) {
    world.addComponent(entity, Respawn, { x, y, z: level, delay: spawn.respawnSeconds });
  }

  world.resources.require(SpatialIndexResource).insert(entity, x, y, level);
  return entity;
}

export function spawnGroundItem(world: World, spawn: GroundItemSpawn): Entity {
  const { x, y, z: level } = spawn;
  const entity = world.createEntity();
  world.addComponent(entity, Position, { x, y, z: level });
  world.addComponent(entity, Sprite, createSprite(spawn.char, spawn.color));
  world.addComponent(entity, Identity, {
    entityType: "item",
    name: spawn.name,
    description: spawn.description,
  });
  world.resources.require(SpatialIndexResource).insert(entity, x, y, level);
  return entity;
}

/**
 * Spawn everything in `population`. Entries on tiles the terrain does not
 * walk are skipped with a warning.
 */
export function populateWorld(world: World, population: WorldPopulation): Entity[] {
  const terrain = world.resources.get(TerrainResource);
  const placeable = (name: string, x: number, y: number, z: number): boolean => {
    if (!terrain || terrain.isWalkable(x, y, z)) return true;
    console.warn(`[Population] Skipping ${name} at (${x}, ${y}, ${z}): not walkable`);
    return false;
  };

  const spawned: Entity[] = [];
  for (const creature of population.creatures) {
    if (placeable(creature.name, creature.x, creature.y, creature.z)) {
      spawned.push(spawnCreature(world, creature));
    }
  }
  const creatures = spawned.length;
  for (const item of population.items) {
    if (placeable(item.name, item.x, item.y, item.z)) {
      spawned.push(spawnGroundItem(world, item));
    }
  }

  console.log(
    `[Population] Spawned ${creatures} creatures and ${spawned.length - creatures} items`,
  );
  return spawned;
}
