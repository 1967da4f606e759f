/**
 * Spatial Components
 *
 * Position, movement and collision.
 */

import { defineComponent } from "@ashfall/ecs";

/**
 * World position. Every entity with a Position is also in the spatial
 * index at the same coordinates.
 */
export interface PositionData {
  x: number;
  y: number;
  z: number;
}

export const Position = defineComponent<PositionData>("Position");

/**
 * Units per second, integrated by the movement system.
 */
export interface VelocityData {
  dx: number;
  dy: number;
  dz: number;
}

export const Velocity = defineComponent<VelocityData>("Velocity");

export interface SolidData {
  blocksMovement: boolean;
  blocksProjectiles: boolean;
}

export const Solid = defineComponent<SolidData>("Solid");
