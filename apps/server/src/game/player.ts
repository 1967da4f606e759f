/**
 * Player Entities
 *
 * Spawning, snapshotting and network serialization of entities.
 */

import type { EntityData } from "@ashfall/contracts";
import type { Entity, World } from "@ashfall/ecs";
import { GAME_RULES } from "../config";
import type { CharacterRecord } from "../infra/repositories";
import {
  AI,
  CombatState,
  Cooldowns,
  createCombatState,
  createCooldowns,
  createInventory,
  createSprite,
  createStats,
  Identity,
  Inventory,
  Player,
  Position,
  Respawn,
  Sprite,
  Stats,
  Vision,
} from "./components";
import { SpatialIndexResource } from "./resources";

export interface SpawnPlayerOptions {
  accountId: number;
  name: string;
  connectionId: string;
  saveIntervalSeconds: number;
  /** Saved character to restore; a fresh character spawns at the default point otherwise. */
  saved?: CharacterRecord | null;
}

export function spawnPlayer(world: World, options: SpawnPlayerOptions): Entity {
  const { saved } = options;
  const base = GAME_RULES.PLAYER.STATS;
  const spawn = saved ? { x: saved.x, y: saved.y, z: saved.z } : GAME_RULES.SPAWN;

  const stats = createStats(
    saved
      ? {
          strength: saved.strength,
          dexterity: saved.dexterity,
          constitution: saved.constitution,
          intelligence: saved.intelligence,
          maxHp: saved.maxHp,
          maxMp: saved.maxMp,
          level: saved.level,
          experience: saved.experience,
          experienceToNext: saved.experienceToNext,
        }
      : base,
  );
  const hp = saved ? Math.min(Math.max(saved.hp, 1), stats.maxHp) : stats.maxHp;
  const mp = saved ? Math.min(saved.mp, stats.maxMp) : stats.maxMp;

  const entity = world.createEntity();
  world.addComponent(entity, Position, { x: spawn.x, y: spawn.y, z: spawn.z });
  world.addComponent(entity, Stats, stats);
  world.addComponent(entity, CombatState, createCombatState(hp, mp));
  world.addComponent(entity, Cooldowns, createCooldowns());
  world.addComponent(entity, Player, {
    accountId: options.accountId,
    characterName: options.name,
    connectionId: options.connectionId,
    lastSaveTime: 0,
    saveInterval: options.saveIntervalSeconds,
  });
  world.addComponent(
    entity,
    Sprite,
    createSprite(GAME_RULES.PLAYER.SPRITE.char, GAME_RULES.PLAYER.SPRITE.color),
  );
  world.addComponent(entity, Identity, {
    entityType: "player",
    name: options.name,
    description: GAME_RULES.PLAYER.DESCRIPTION,
  });
  world.addComponent(entity, Vision, { radius: GAME_RULES.PLAYER.VISION_RADIUS });
  world.addComponent(entity, Inventory, createInventory());
  world.addComponent(entity, Respawn, {
    x: GAME_RULES.SPAWN.x,
    y: GAME_RULES.SPAWN.y,
    z: GAME_RULES.SPAWN.z,
    delay: GAME_RULES.PLAYER.RESPAWN_DELAY,
  });

  world.resources.require(SpatialIndexResource).insert(entity, spawn.x, spawn.y, spawn.z);
  return entity;
}

/**
 * Remove an entity from the spatial index and the store.
 */
export function despawnEntity(world: World, entity: Entity): void {
  world.resources.get(SpatialIndexResource)?.remove(entity);
  world.destroyEntity(entity);
}

export function snapshotCharacter(world: World, entity: Entity): CharacterRecord | null {
  const player = world.getComponent(entity, Player);
  const pos = world.getComponent(entity, Position);
  const stats = world.getComponent(entity, Stats);
  const combat = world.getComponent(entity, CombatState);
  if (!player || !pos || !stats || !combat) return null;

  return {
    accountId: player.accountId,
    name: player.characterName,
    x: pos.x,
    y: pos.y,
    z: pos.z,
    hp: combat.hp,
    mp: combat.mp,
    level: stats.level,
    experience: stats.experience,
    experienceToNext: stats.experienceToNext,
    strength: stats.strength,
    dexterity: stats.dexterity,
    constitution: stats.constitution,
    intelligence: stats.intelligence,
    maxHp: stats.maxHp,
    maxMp: stats.maxMp,
  };
}

/**
 * Network view of an entity. Entities without a position, identity or
 * sprite are not visible to clients.
 */
export function toEntityData(world: World, entity: Entity): EntityData | null {
  const pos = world.getComponent(entity, Position);
  const identity = world.getComponent(entity, Identity);
  const sprite = world.getComponent(entity, Sprite);
  if (!pos || !identity || !sprite) return null;

  const stats = world.getComponent(entity, Stats);
  const combat = world.getComponent(entity, CombatState);
  const ai = world.getComponent(entity, AI);

  return {
    entity_id: entity,
    entity_type: identity.entityType,
    name: identity.name,
    x: pos.x,
    y: pos.y,
    z: pos.z,
    char: sprite.char,
    color: sprite.color,
    hp: combat ? combat.hp : null,
    max_hp: stats ? stats.maxHp : null,
    level: stats ? stats.level : null,
    faction: ai ? ai.faction : null,
  };
}
