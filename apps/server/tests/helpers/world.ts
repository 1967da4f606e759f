import type { Entity, World } from "@ashfall/ecs";
import { loadConfig, type ServerConfig } from "../../src/config";
import {
  CombatState,
  createCombatState,
  createSprite,
  createStats,
  Identity,
  Position,
  Sprite,
  Stats,
  type StatsData,
} from "../../src/game/components";
import { initializeWorld } from "../../src/game/game-init";
import { SpatialIndexResource, type TileLegend, TileMapTerrain } from "../../src/game/resources";

export const TEST_LEGEND: TileLegend = {
  empty: " ",
  tiles: {
    " ": { name: "empty", color: "#000000", solid: false, blocksVision: false },
    ".": { name: "floor", color: "#a0a0a0", solid: false, blocksVision: false },
    "#": { name: "wall", color: "#404040", solid: true, blocksVision: true },
  },
};

/**
 * 20x20 room walled on every side, with one extra wall at (10, 8), two
 * steps east of the spawn point.
 */
export function createTestTerrain(): TileMapTerrain {
  const rows: string[] = [];
  for (let y = 0; y < 20; y++) {
    let row = "";
    for (let x = 0; x < 20; x++) {
      const edge = x === 0 || y === 0 || x === 19 || y === 19;
      row += edge || (x === 10 && y === 8) ? "#" : ".";
    }
    rows.push(row);
  }
  return new TileMapTerrain(TEST_LEGEND, [{ z: 0, rows }]);
}

export function createTestConfig(overrides: Record<string, string> = {}): ServerConfig {
  return loadConfig({ NODE_ENV: "test", ...overrides });
}

export function createTestWorld(config: ServerConfig = createTestConfig()): World {
  return initializeWorld(config, createTestTerrain());
}

export interface MonsterOptions {
  x: number;
  y: number;
  z?: number;
  hp?: number;
  name?: string;
  stats?: Partial<StatsData>;
}

/** A fighting NPC registered in the spatial index. */
export function spawnMonster(world: World, options: MonsterOptions): Entity {
  const { x, y, z = 0 } = options;
  const stats = createStats(options.stats);
  const entity = world.createEntity();

  world.addComponent(entity, Position, { x, y, z });
  world.addComponent(entity, Stats, stats);
  world.addComponent(entity, CombatState, createCombatState(options.hp ?? stats.maxHp, stats.maxMp));
  world.addComponent(entity, Identity, {
    entityType: "npc",
    name: options.name ?? "Rat",
    description: "",
  });
  world.addComponent(entity, Sprite, createSprite("r", "#8b4513"));
  world.resources.require(SpatialIndexResource).insert(entity, x, y, z);
  return entity;
}

/** An item lying on the ground. */
export function dropItem(world: World, name: string, x: number, y: number, z = 0): Entity {
  const entity = world.createEntity();
  world.addComponent(entity, Position, { x, y, z });
  world.addComponent(entity, Identity, { entityType: "item", name, description: "" });
  world.addComponent(entity, Sprite, createSprite("!", "#ff00ff"));
  world.resources.require(SpatialIndexResource).insert(entity, x, y, z);
  return entity;
}
