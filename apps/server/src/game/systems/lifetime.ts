import { defineSystem, type Entity } from "@ashfall/ecs";
import { isExpired, Lifetime } from "../components";
import { GameClockResource, SpatialIndexResource } from "../resources";

/**
 * Destroys entities whose lifetime has run out.
 */
export const LifetimeSystem = defineSystem("Lifetime")
  .priority(10)
  .execute((_dt, world) => {
    const now = world.resources.require(GameClockResource).elapsed;
    const spatial = world.resources.get(SpatialIndexResource);

    const expired: Entity[] = [];
    for (const [entity, lifetime] of world.query(Lifetime)) {
      if (isExpired(lifetime, now)) expired.push(entity);
    }

    for (const entity of expired) {
      spatial?.remove(entity);
      world.destroyEntity(entity);
    }
  });
