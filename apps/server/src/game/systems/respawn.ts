import { defineSystem, type Entity, type World } from "@ashfall/ecs";
import { AI, CombatState, Dead, Position, Respawn, Stats } from "../components";
import { GameClockResource, SpatialIndexResource } from "../resources";

/**
 * Bring a dead entity back at its respawn point with full health. Returns
 * false when the entity is alive or has no Respawn.
 */
export function respawnEntity(world: World, entity: Entity): boolean {
  const respawn = world.getComponent(entity, Respawn);
  if (!respawn || !world.hasComponent(entity, Dead)) return false;

  world.removeComponent(entity, Dead);

  const stats = world.getComponent(entity, Stats);
  const combat = world.getComponent(entity, CombatState);
  if (stats && combat) {
    combat.hp = stats.maxHp;
    combat.mp = stats.maxMp;
    combat.target = null;
    combat.inCombat = false;
    combat.targetedBy.clear();
    combat.threat.clear();
  }

  const ai = world.getComponent(entity, AI);
  if (ai) ai.currentTarget = null;

  const pos = world.getComponent(entity, Position);
  if (pos) {
    pos.x = respawn.x;
    pos.y = respawn.y;
    pos.z = respawn.z;
    world.resources.require(SpatialIndexResource).update(entity, pos.x, pos.y, pos.z);
  }

  console.log(`[Respawn] Entity ${entity} respawned at (${respawn.x}, ${respawn.y}, ${respawn.z})`);
  return true;
}

/**
 * Respawns dead entities once their respawn delay has passed.
 */
export const RespawnSystem = defineSystem("Respawn")
  .priority(20)
  .execute((_dt, world) => {
    const now = world.resources.require(GameClockResource).elapsed;

    const ready: Entity[] = [];
    for (const [entity, dead, respawn] of world.query(Dead, Respawn)) {
      if (now >= dead.timeOfDeath + respawn.delay) ready.push(entity);
    }

    for (const entity of ready) respawnEntity(world, entity);
  });
