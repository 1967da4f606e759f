/**
 * Game Resources
 *
 * World-scoped singletons shared by systems and the network layer.
 */

import { defineResource, type SpatialHashGrid } from "@ashfall/ecs";
import type { TickEventLog } from "./events";
import type { TerrainOracle } from "./terrain";

export * from "./events";
export * from "./terrain";

/** Simulation time in seconds, advanced once per tick. */
export interface GameClock {
  elapsed: number;
  tick: number;
}

export const GameClockResource = defineResource<GameClock>("gameClock");
export const SpatialIndexResource = defineResource<SpatialHashGrid>("spatialIndex");
export const TerrainResource = defineResource<TerrainOracle>("terrain");
export const TickEventsResource = defineResource<TickEventLog>("tickEvents");
