/**
 * Game Systems Tests
 *
 * Combat, experience, cooldowns, movement, respawns and lifetimes.
 */

import { type Entity, SystemScheduler, type World } from "@ashfall/ecs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CombatState,
  Cooldowns,
  Dead,
  Lifetime,
  Position,
  Stats,
  Velocity,
} from "../../src/game/components";
import { createScheduler } from "../../src/game/game-init";
import { spawnPlayer } from "../../src/game/player";
import { GameClockResource, SpatialIndexResource, TickEventsResource } from "../../src/game/resources";
import {
  applyDamage,
  awardExperience,
  calculateDamage,
  canAct,
  ClockSystem,
  CombatSystem,
  CooldownSystem,
  LifetimeSystem,
  MovementSystem,
  moveEntity,
  RespawnSystem,
  triggerCooldown,
} from "../../src/game/systems";
import { InMemoryCharacterRepository } from "../../src/infra/repositories";
import { createTestWorld, spawnMonster } from "../helpers/world";

function spawnHero(world: World): Entity {
  return spawnPlayer(world, {
    accountId: 1,
    name: "Hero",
    connectionId: "conn_1",
    saveIntervalSeconds: 60,
  });
}

function eventTypes(world: World): string[] {
  return world.resources
    .require(TickEventsResource)
    .drain()
    .map(({ event }) => event.type);
}

describe("Game Systems", () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  describe("scheduling", () => {
    it("should run systems in descending priority", () => {
      const names = createScheduler(new InMemoryCharacterRepository())
        .getSystems()
        .map((system) => system.name);

      expect(names).toEqual([
        "Clock",
        "Cooldown",
        "Movement",
        "Combat",
        "Respawn",
        "Lifetime",
        "PlayerPersistence",
      ]);
    });

    it("should advance the game clock once per tick", () => {
      const scheduler = new SystemScheduler();
      scheduler.add(ClockSystem);
      scheduler.update(0.05, world);
      scheduler.update(0.05, world);

      expect(world.resources.require(GameClockResource)).toEqual({ elapsed: 0.1, tick: 2 });
    });
  });

  describe("CombatSystem", () => {
    let scheduler: SystemScheduler;
    let hero: Entity;

    beforeEach(() => {
      scheduler = new SystemScheduler();
      scheduler.add(ClockSystem);
      scheduler.add(CooldownSystem);
      scheduler.add(CombatSystem);
      hero = spawnHero(world);
    });

    it("should subtract armor with a floor of one", () => {
      expect(calculateDamage(10, 2)).toBe(8);
      expect(calculateDamage(3, 10)).toBe(1);
    });

    it("should hit a target in melee range and start the cooldown", () => {
      const rat = spawnMonster(world, { x: 9, y: 8, hp: 30, stats: { armor: 2 } });
      const heroCombat = world.getComponent(hero, CombatState);
      if (heroCombat) heroCombat.target = rat;

      scheduler.update(0.05, world);

      expect(world.getComponent(rat, CombatState)?.hp).toBe(22);
      expect(world.getComponent(rat, CombatState)?.threat.get(hero)).toBe(8);
      const cooldown = world.getComponent(hero, Cooldowns)?.active.get("attack");
      expect(cooldown?.duration).toBe(1);
      expect(cooldown?.expiresAt).toBeCloseTo(1.05);
      expect(eventTypes(world)).toEqual(["damage_event", "combat_event"]);

      scheduler.update(0.05, world);
      expect(world.getComponent(rat, CombatState)?.hp).toBe(22);
    });

    it("should not hit a target out of range", () => {
      const rat = spawnMonster(world, { x: 12, y: 8, hp: 30 });
      const heroCombat = world.getComponent(hero, CombatState);
      if (heroCombat) heroCombat.target = rat;

      scheduler.update(0.05, world);

      expect(world.getComponent(rat, CombatState)?.hp).toBe(30);
      expect(eventTypes(world)).toEqual([]);
    });

    it("should kill, award experience and drop the dead target", () => {
      const rat = spawnMonster(world, { x: 8, y: 9, hp: 5, stats: { level: 3 } });
      const heroCombat = world.getComponent(hero, CombatState);
      if (heroCombat) heroCombat.target = rat;

      scheduler.update(0.05, world);

      expect(world.getComponent(rat, Dead)).toEqual({ timeOfDeath: 0.05, killer: hero });
      expect(world.getComponent(hero, Stats)?.experience).toBe(30);
      expect(eventTypes(world)).toEqual(["damage_event", "death_event", "combat_event"]);

      scheduler.update(0.05, world);
      expect(heroCombat?.target).toBeNull();
      expect(heroCombat?.inCombat).toBe(false);
    });

    it("should place damage events at the target", () => {
      const rat = spawnMonster(world, { x: 9, y: 9, hp: 50 });
      applyDamage(world, rat, hero, 12);

      const [logged] = world.resources.require(TickEventsResource).drain();
      expect(logged.origin).toEqual({ x: 9, y: 9, z: 0 });
      expect(logged.event).toEqual({
        type: "damage_event",
        data: {
          target_id: rat,
          source_id: hero,
          amount: 12,
          damage_type: "physical",
          current_hp: 38,
          max_hp: 100,
        },
      });
    });

    it("should ignore damage to the dead", () => {
      const rat = spawnMonster(world, { x: 9, y: 9, hp: 1 });
      applyDamage(world, rat, hero, 5);
      world.resources.require(TickEventsResource).drain();

      expect(applyDamage(world, rat, hero, 5)).toBe(0);
      expect(eventTypes(world)).toEqual([]);
    });
  });

  describe("experience", () => {
    it("should level up and recompute derived stats", () => {
      const hero = spawnHero(world);
      const rat = spawnMonster(world, { x: 9, y: 9, stats: { level: 2 } });
      const stats = world.getComponent(hero, Stats);
      if (stats) stats.experience = 90;

      awardExperience(world, hero, rat);

      expect(stats).toMatchObject({
        level: 2,
        experience: 10,
        experienceToNext: 150,
        strength: 17,
        constitution: 16,
        dexterity: 13,
        maxHp: 270,
        maxMp: 106,
        attackPower: 44,
        armor: 8,
      });
      expect(world.getComponent(hero, CombatState)?.hp).toBe(270);

      const [logged] = world.resources.require(TickEventsResource).drain();
      expect(logged.event).toEqual({
        type: "level_up_event",
        data: {
          entity_id: hero,
          new_level: 2,
          stat_gains: { strength: 2, constitution: 2, dexterity: 1 },
        },
      });
    });
  });

  describe("cooldowns", () => {
    it("should block actions until the cooldown expires", () => {
      const hero = spawnHero(world);
      const scheduler = new SystemScheduler();
      scheduler.add(ClockSystem);
      scheduler.add(CooldownSystem);

      triggerCooldown(world, hero, "attack", 1);
      expect(canAct(world, hero, "attack")).toBe(false);
      expect(canAct(world, hero, "cast")).toBe(false);

      for (let i = 0; i < 11; i++) scheduler.update(0.05, world);
      expect(canAct(world, hero, "cast")).toBe(true);
      expect(canAct(world, hero, "attack")).toBe(false);

      for (let i = 0; i < 12; i++) scheduler.update(0.05, world);
      expect(canAct(world, hero, "attack")).toBe(true);
      expect(world.getComponent(hero, Cooldowns)?.active.size).toBe(0);
    });
  });

  describe("movement", () => {
    it("should step onto walkable tiles and update the spatial index", () => {
      const hero = spawnHero(world);

      expect(moveEntity(world, hero, 1, 0, 0)).toBe(true);
      expect(world.getComponent(hero, Position)).toEqual({ x: 9, y: 8, z: 0 });
      expect(world.resources.require(SpatialIndexResource).getPosition(hero)).toEqual({
        x: 9,
        y: 8,
        z: 0,
      });
    });

    it("should refuse walls and leave the entity in place", () => {
      const hero = spawnHero(world);
      moveEntity(world, hero, 1, 0, 0);

      expect(moveEntity(world, hero, 1, 0, 0)).toBe(false);
      expect(world.getComponent(hero, Position)).toEqual({ x: 9, y: 8, z: 0 });
    });

    it("should refuse steps below the lowest level", () => {
      const hero = spawnHero(world);
      expect(moveEntity(world, hero, 0, 0, -1)).toBe(false);
    });

    it("should refuse to move the dead", () => {
      const hero = spawnHero(world);
      world.addComponent(hero, Dead, { timeOfDeath: 0, killer: null });
      expect(moveEntity(world, hero, 0, 1, 0)).toBe(false);
    });

    it("should integrate velocity", () => {
      const rat = spawnMonster(world, { x: 2, y: 2 });
      world.addComponent(rat, Velocity, { dx: 20, dy: 0, dz: 0 });
      const scheduler = new SystemScheduler();
      scheduler.add(MovementSystem);

      scheduler.update(0.05, world);

      expect(world.getComponent(rat, Position)).toEqual({ x: 3, y: 2, z: 0 });
    });
  });

  describe("respawns and lifetimes", () => {
    let scheduler: SystemScheduler;

    beforeEach(() => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      scheduler = new SystemScheduler();
      scheduler.add(ClockSystem);
      scheduler.add(RespawnSystem);
      scheduler.add(LifetimeSystem);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should bring a dead player back at the spawn point after the delay", () => {
      const hero = spawnHero(world);
      moveEntity(world, hero, 1, 0, 0);
      const combat = world.getComponent(hero, CombatState);
      if (combat) combat.target = 42;
      applyDamage(world, hero, null, 1000);
      expect(world.hasComponent(hero, Dead)).toBe(true);
      expect(world.hasComponent(hero, Lifetime)).toBe(false);

      for (let i = 0; i < 100; i++) scheduler.update(0.05, world);
      expect(world.hasComponent(hero, Dead)).toBe(true);

      scheduler.update(0.05, world);
      expect(world.hasComponent(hero, Dead)).toBe(false);
      expect(world.getComponent(hero, Position)).toEqual({ x: 8, y: 8, z: 0 });
      expect(world.resources.require(SpatialIndexResource).getPosition(hero)).toEqual({
        x: 8,
        y: 8,
        z: 0,
      });
      expect(combat?.hp).toBe(140);
      expect(combat?.target).toBeNull();
      expect(moveEntity(world, hero, 1, 0, 0)).toBe(true);
    });

    it("should leave a corpse that decays when the dead never respawn", () => {
      const rat = spawnMonster(world, { x: 3, y: 3, hp: 1 });
      scheduler.update(0.05, world);
      applyDamage(world, rat, null, 5);

      expect(world.getComponent(rat, Lifetime)).toEqual({ createdAt: 0.05, duration: 30 });
      expect(world.hasComponent(rat, Dead)).toBe(true);
    });

    it("should destroy expired entities and unindex them", () => {
      const spark = spawnMonster(world, { x: 3, y: 3 });
      world.addComponent(spark, Lifetime, { createdAt: 0, duration: 0.1 });
      const scheduler = new SystemScheduler();
      scheduler.add(ClockSystem);
      scheduler.add(LifetimeSystem);

      scheduler.update(0.05, world);
      expect(world.isAlive(spark)).toBe(true);

      scheduler.update(0.05, world);
      expect(world.isAlive(spark)).toBe(false);
      expect(world.resources.require(SpatialIndexResource).has(spark)).toBe(false);
    });
  });
});
