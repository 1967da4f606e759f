import { defineSystem } from "@ashfall/ecs";
import { GameClockResource } from "../resources";

/**
 * Advances simulation time before any other system reads it.
 */
export const ClockSystem = defineSystem("Clock")
  .priority(1000)
  .execute((dt, world) => {
    const clock = world.resources.require(GameClockResource);
    clock.elapsed += dt;
    clock.tick++;
  });
