import { fileURLToPath } from "node:url";
import type { World } from "@ashfall/ecs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AI, CombatState, Dead, Position, Respawn, Solid, Stats } from "../../src/game/components";
import { initializeWorld } from "../../src/game/game-init";
import { spawnPlayer, toEntityData } from "../../src/game/player";
import {
  loadPopulation,
  populateWorld,
  spawnCreature,
  WorldPopulationSchema,
} from "../../src/game/population";
import { TileMapTerrain } from "../../src/game/resources";
import { moveEntity } from "../../src/game/systems";
import { createTestConfig, createTestWorld } from "../helpers/world";

const dataPath = (name: string) => fileURLToPath(new URL(`../../data/${name}`, import.meta.url));

describe("world population", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("schema", () => {
    it("fills defaults for optional fields", () => {
      const population = WorldPopulationSchema.parse({
        creatures: [
          {
            name: "Rat",
            char: "r",
            color: "#8b4513",
            faction: "wildlife",
            hp: 10,
            attack: 2,
            x: 3,
            y: 4,
          },
        ],
      });

      expect(population.items).toEqual([]);
      expect(population.creatures[0]).toEqual({
        name: "Rat",
        char: "r",
        color: "#8b4513",
        description: "",
        faction: "wildlife",
        state: "idle",
        level: 1,
        hp: 10,
        attack: 2,
        armor: 0,
        moveSpeed: 3,
        aggroRadius: 0,
        attackRange: 1.5,
        x: 3,
        y: 4,
        z: 0,
      });
    });

    it("rejects sprites longer than one character", () => {
      const result = WorldPopulationSchema.safeParse({
        items: [{ name: "Key", char: "!!", color: "#ffffff", x: 1, y: 1 }],
      });
      expect(result.success).toBe(false);
    });
  });

  describe("starter file", () => {
    let world: World;

    beforeEach(() => {
      const terrain = TileMapTerrain.fromFiles(
        dataPath("starter-map.txt"),
        dataPath("tile-legend.json"),
      );
      const population = loadPopulation(dataPath("starter-population.json"));
      world = initializeWorld(createTestConfig(), terrain, population);
    });

    it("places every creature and item on walkable ground", () => {
      expect(world.getEntityCount()).toBe(11);
      expect(console.warn).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledWith("[Population] Spawned 9 creatures and 2 items");
    });

    it("gives hostiles a faction and a respawn point, townsfolk no respawn", () => {
      expect(toEntityData(world, 1)).toMatchObject({ name: "Merchant", faction: "friendly", hp: 100 });
      expect(world.hasComponent(1, Respawn)).toBe(false);

      expect(toEntityData(world, 5)).toMatchObject({
        name: "Goblin",
        entity_type: "npc",
        faction: "hostile",
        x: 20,
        y: 3,
        z: 0,
      });
      expect(world.getComponent(5, Respawn)).toEqual({ x: 20, y: 3, z: 0, delay: 30 });
      expect(world.getComponent(5, AI)?.state).toBe("wandering");
      expect(world.getComponent(8, Stats)).toMatchObject({ level: 3, maxHp: 60, attackPower: 12 });
    });

    it("lays items on the ground", () => {
      expect(toEntityData(world, 10)).toMatchObject({
        entity_type: "item",
        name: "Health Potion",
        char: "!",
        x: 10,
        y: 10,
        hp: null,
        faction: null,
      });
    });
  });

  it("skips entries on unwalkable tiles", () => {
    const world = createTestWorld();
    const spawned = populateWorld(world, {
      creatures: [],
      items: [
        { name: "Lamp", char: "*", color: "#ffff00", description: "", x: 10, y: 8, z: 0 },
        { name: "Coin", char: "$", color: "#ffd700", description: "", x: 11, y: 8, z: 0 },
      ],
    });

    expect(spawned).toHaveLength(1);
    expect(world.getComponent(spawned[0], Position)).toEqual({ x: 11, y: 8, z: 0 });
    expect(console.warn).toHaveBeenCalledWith(
      "[Population] Skipping Lamp at (10, 8, 0): not walkable",
    );
  });

  it("keeps players off tiles held by living creatures", () => {
    const world = createTestWorld();
    const guard = spawnCreature(world, {
      name: "Guard",
      char: "G",
      color: "#0000ff",
      description: "",
      faction: "neutral",
      state: "idle",
      level: 1,
      hp: 50,
      attack: 4,
      armor: 0,
      moveSpeed: 3,
      aggroRadius: 0,
      attackRange: 1.5,
      x: 8,
      y: 9,
      z: 0,
    });
    const hero = spawnPlayer(world, {
      accountId: 1,
      name: "alice",
      connectionId: "c1",
      saveIntervalSeconds: 60,
    });

    expect(world.getComponent(guard, Solid)?.blocksMovement).toBe(true);
    expect(world.getComponent(guard, CombatState)?.hp).toBe(50);
    expect(moveEntity(world, hero, 0, 1, 0)).toBe(false);

    world.addComponent(guard, Dead, { timeOfDeath: 0, killer: hero });
    expect(moveEntity(world, hero, 0, 1, 0)).toBe(true);
    expect(world.getComponent(hero, Position)).toEqual({ x: 8, y: 9, z: 0 });
  });
});
