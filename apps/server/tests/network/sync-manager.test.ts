import type { Entity, World } from "@ashfall/ecs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { GameSession, NetworkSyncManager } from "../../src/game/network";
import { Vision } from "../../src/game/components";
import { despawnEntity, spawnPlayer } from "../../src/game/player";
import { TickEventLog } from "../../src/game/resources";
import { MockConnection } from "../helpers/mock-connection";
import { createTestWorld, spawnMonster } from "../helpers/world";

describe("NetworkSyncManager", () => {
  let world: World;
  let sync: NetworkSyncManager;
  let session: GameSession;
  let player: Entity;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    world = createTestWorld();
    sync = new NetworkSyncManager(world, { aoiRadius: 5, visionRadius: 1, chatHistory: 2 });
    player = spawnPlayer(world, {
      accountId: 1,
      name: "alice",
      connectionId: "c1",
      saveIntervalSeconds: 60,
    });
    session = new GameSession(new MockConnection("c1"), 20, 0);
    session.entity = player;
    session.state = "in_game";
  });

  describe("area of interest", () => {
    it("covers a cube around the entity and leaves the entity out", () => {
      const near = spawnMonster(world, { x: 12, y: 8 });
      const corner = spawnMonster(world, { x: 12, y: 12 });
      spawnMonster(world, { x: 14, y: 8 });

      expect(sync.getAreaOfInterest(player).sort((a, b) => a - b)).toEqual([near, corner]);
    });

    it("checks single points against the same cube", () => {
      expect(sync.isInAreaOfInterest(player, { x: 4, y: 12, z: 0 })).toBe(true);
      expect(sync.isInAreaOfInterest(player, { x: 8, y: 8, z: 6 })).toBe(false);
      expect(sync.isInAreaOfInterest(999, { x: 8, y: 8, z: 0 })).toBe(false);
    });
  });

  describe("full state", () => {
    it("includes the player, nearby entities and visible tiles", () => {
      const rat = spawnMonster(world, { x: 9, y: 9 });

      const state = sync.getFullState(session, 7);

      expect(state?.tick).toBe(7);
      expect(state?.player.entity_id).toBe(player);
      expect(state?.entities.map((e) => e.entity_id)).toEqual([rat]);
      expect(Object.keys(state?.world_tiles ?? {}).sort()).toEqual([
        "7,8,0",
        "8,7,0",
        "8,8,0",
        "8,9,0",
        "9,8,0",
      ]);
      expect(session.lastAoi).toEqual(new Set([rat]));
    });

    it("narrows the tiles to the entity's own vision", () => {
      const vision = world.getComponent(player, Vision);
      if (vision) vision.radius = 0;

      expect(Object.keys(sync.getFullState(session, 0)?.world_tiles ?? {})).toEqual(["8,8,0"]);
    });

    it("is null without an entity", () => {
      session.entity = null;
      expect(sync.getFullState(session, 0)).toBeNull();
    });

    it("replays only the most recent chat lines", () => {
      for (const message of ["one", "two", "three"]) {
        sync.recordChat({ sender_name: "bob", message, channel: "global", timestamp: 0 });
      }

      expect(sync.getFullState(session, 0)?.messages.map((line) => line.message)).toEqual([
        "two",
        "three",
      ]);
    });
  });

  describe("delta", () => {
    it("leads with the session's own entity", () => {
      const rat = spawnMonster(world, { x: 10, y: 10 });

      const delta = sync.getStateDelta(session, 3, []);

      expect(delta?.tick).toBe(3);
      expect(delta?.changed_entities.map((e) => e.entity_id)).toEqual([player, rat]);
      expect(delta?.removed_entities).toEqual([]);
      expect(delta?.changed_tiles).toEqual({});
    });

    it("reports entities that dropped out since the last delta", () => {
      const rat = spawnMonster(world, { x: 10, y: 10 });
      sync.getStateDelta(session, 0, []);

      despawnEntity(world, rat);
      const delta = sync.getStateDelta(session, 1, []);

      expect(delta?.removed_entities).toEqual([rat]);
      expect(sync.getStateDelta(session, 2, [])?.removed_entities).toEqual([]);
    });

    it("keeps nearby and global events and drops distant ones", () => {
      const log = new TickEventLog();
      log.push(
        {
          type: "death_event",
          data: { entity_id: 5, killer_id: null, entity_name: "Rat", killer_name: null },
        },
        { x: 9, y: 8, z: 0 },
      );
      log.push(
        {
          type: "death_event",
          data: { entity_id: 6, killer_id: null, entity_name: "Bat", killer_name: null },
        },
        { x: 30, y: 8, z: 0 },
      );
      log.push({
        type: "level_up_event",
        data: { entity_id: 7, new_level: 2, stat_gains: {} },
      });

      const events = sync.getStateDelta(session, 0, log.drain())?.events ?? [];

      expect(events.map((e) => e.type)).toEqual(["death_event", "level_up_event"]);
      expect(events[0]?.data).toMatchObject({ entity_id: 5 });
    });

    it("skips sessions whose entity is gone", () => {
      despawnEntity(world, player);
      expect(sync.getStateDelta(session, 0, [])).toBeNull();
    });
  });
});
