/**
 * Movement System
 *
 * Integrates velocity into position. Positions stay inside the world bounds
 * and on walkable terrain, off tiles held by living solid entities, and the
 * spatial index follows every change.
 */

import { defineSystem, type Entity, type World } from "@ashfall/ecs";
import { GAME_RULES } from "../../config";
import { Dead, Position, Solid, Velocity } from "../components";
import { SpatialIndexResource, TerrainResource } from "../resources";

const { min, max, minZ, maxZ } = GAME_RULES.WORLD_BOUNDS;

function clamp(value: number, lower: number, upper: number): number {
  return Math.max(lower, Math.min(upper, value));
}

/**
 * Whether `(x, y, z)` is inside the world and, when terrain is registered,
 * walkable.
 */
export function canMoveTo(world: World, x: number, y: number, z: number): boolean {
  if (x < min || x > max || y < min || y > max || z < minZ || z > maxZ) {
    return false;
  }
  const terrain = world.resources.get(TerrainResource);
  return terrain ? terrain.isWalkable(Math.floor(x), Math.floor(y), Math.floor(z)) : true;
}

/**
 * Whether a living entity other than `mover` that blocks movement stands on
 * the tile containing `(x, y, z)`.
 */
export function isOccupied(world: World, mover: Entity, x: number, y: number, z: number): boolean {
  const tx = Math.floor(x);
  const ty = Math.floor(y);
  const tz = Math.floor(z);
  const spatial = world.resources.require(SpatialIndexResource);

  for (const other of spatial.queryPoint(x, y, z)) {
    if (other === mover || world.hasComponent(other, Dead)) continue;
    if (!world.getComponent(other, Solid)?.blocksMovement) continue;
    const pos = world.getComponent(other, Position);
    if (pos && Math.floor(pos.x) === tx && Math.floor(pos.y) === ty && Math.floor(pos.z) === tz) {
      return true;
    }
  }
  return false;
}

/**
 * Step an entity by a delta. Refused steps leave the entity untouched.
 *
 * @returns true when the entity moved
 */
export function moveEntity(
  world: World,
  entity: Entity,
  dx: number,
  dy: number,
  dz: number,
): boolean {
  if (!world.isAlive(entity) || world.hasComponent(entity, Dead)) return false;
  const pos = world.getComponent(entity, Position);
  if (!pos) return false;

  const x = pos.x + dx;
  const y = pos.y + dy;
  const z = pos.z + dz;
  if (!canMoveTo(world, x, y, z) || isOccupied(world, entity, x, y, z)) return false;

  pos.x = x;
  pos.y = y;
  pos.z = z;
  world.resources.require(SpatialIndexResource).update(entity, x, y, z);
  return true;
}

export const MovementSystem = defineSystem("Movement")
  .priority(90)
  .execute((dt, world) => {
    const spatial = world.resources.require(SpatialIndexResource);

    for (const [entity, pos, vel] of world.query(Position, Velocity)) {
      if (vel.dx === 0 && vel.dy === 0 && vel.dz === 0) continue;
      if (world.hasComponent(entity, Dead)) continue;

      const x = clamp(pos.x + vel.dx * dt, min, max);
      const y = clamp(pos.y + vel.dy * dt, min, max);
      const z = clamp(pos.z + vel.dz * dt, minZ, maxZ);
      if (!canMoveTo(world, x, y, z) || isOccupied(world, entity, x, y, z)) continue;

      pos.x = x;
      pos.y = y;
      pos.z = z;
      spatial.update(entity, x, y, z);
    }
  });
