/**
 * Game Initialization
 *
 * Assembles the world, its systems, the tick loop and the game server.
 */

import { GameLoop, SpatialHashGrid, SystemScheduler, World } from "@ashfall/ecs";
import type { ServerConfig } from "../config";
import type { AccountStore, CharacterRepository } from "../infra/repositories";
import { registerGameComponents } from "./components";
import { GameServer } from "./network";
import { populateWorld, type WorldPopulation } from "./population";
import {
  GameClockResource,
  SpatialIndexResource,
  type TerrainOracle,
  TerrainResource,
  TickEventLog,
  TickEventsResource,
} from "./resources";
import {
  ClockSystem,
  CombatSystem,
  CooldownSystem,
  createPlayerPersistenceSystem,
  LifetimeSystem,
  MovementSystem,
  RespawnSystem,
} from "./systems";

// =============================================================================
// Game Instance
// =============================================================================

export interface GameInstance {
  world: World;
  loop: GameLoop;
  gameServer: GameServer;
  /** Start ticking. Settles once the loop has stopped again. */
  start: () => Promise<void>;
  /** Finish the current tick and stop. */
  stop: () => Promise<void>;
  isRunning: () => boolean;
  /** Stop the loop if running, disconnect everyone and flush saves. */
  shutdown: () => Promise<void>;
}

export interface GameDependencies {
  config: ServerConfig;
  terrain: TerrainOracle;
  accounts: AccountStore;
  characters: CharacterRepository;
  /** Creatures and items placed before the first tick. */
  population?: WorldPopulation;
}

// =============================================================================
// Initialization Functions
// =============================================================================

/**
 * World with every component registered, the shared resources in place
 * and, when given, the starting population spawned.
 */
export function initializeWorld(
  config: ServerConfig,
  terrain: TerrainOracle,
  population?: WorldPopulation,
): World {
  const world = new World();

  registerGameComponents(world);

  world.resources.set(GameClockResource, { elapsed: 0, tick: 0 });
  world.resources.set(SpatialIndexResource, new SpatialHashGrid(config.SPATIAL_CELL_SIZE));
  world.resources.set(TerrainResource, terrain);
  world.resources.set(TickEventsResource, new TickEventLog());

  if (population) populateWorld(world, population);

  console.log(
    `[GameInit] World initialized (cell size ${config.SPATIAL_CELL_SIZE}, AOI radius ${config.AOI_RADIUS})`,
  );
  return world;
}

export function createScheduler(characters: CharacterRepository): SystemScheduler {
  const scheduler = new SystemScheduler();
  scheduler.add(ClockSystem);
  scheduler.add(CooldownSystem);
  scheduler.add(MovementSystem);
  scheduler.add(CombatSystem);
  scheduler.add(RespawnSystem);
  scheduler.add(LifetimeSystem);
  scheduler.add(createPlayerPersistenceSystem(characters));
  return scheduler;
}

export function createGameInstance(deps: GameDependencies): GameInstance {
  const { config } = deps;
  const world = initializeWorld(config, deps.terrain, deps.population);
  const loop = new GameLoop(world, createScheduler(deps.characters), {
    tickRate: config.TICK_RATE,
    historyLength: config.TICK_HISTORY,
  });
  const gameServer = new GameServer({
    loop,
    accounts: deps.accounts,
    characters: deps.characters,
    config,
  });

  console.log("[GameInit] Game instance created");

  const isRunning = () => loop.state === "running";

  return {
    world,
    loop,
    gameServer,
    start: () => loop.start(),
    stop: () => loop.stop(),
    isRunning,
    shutdown: async () => {
      if (isRunning()) await loop.stop();
      await gameServer.shutdown();
      world.clear();
      console.log("[GameInit] Game instance shut down");
    },
  };
}
