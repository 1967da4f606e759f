import { defineComponent } from "@ashfall/ecs";

/** Tile radius the entity sees; the server's vision radius caps it. */
export interface VisionData {
  radius: number;
}

export const Vision = defineComponent<VisionData>("Vision");

/**
 * Destroy the entity once `duration` seconds of simulation time have passed
 * since `createdAt`.
 */
export interface LifetimeData {
  createdAt: number;
  duration: number;
}

export const Lifetime = defineComponent<LifetimeData>("Lifetime");

export function isExpired(lifetime: LifetimeData, now: number): boolean {
  return now >= lifetime.createdAt + lifetime.duration;
}

export interface SpriteData {
  char: string;
  color: string;
  bgColor: string;
  zOrder: number;
}

export const Sprite = defineComponent<SpriteData>("Sprite");

export function createSprite(char: string, color = "white"): SpriteData {
  return { char, color, bgColor: "transparent", zOrder: 0 };
}
