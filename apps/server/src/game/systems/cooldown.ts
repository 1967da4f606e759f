/**
 * Cooldown System
 *
 * Expires per-action cooldowns and the global cooldown.
 */

import { defineSystem, type Entity, type World } from "@ashfall/ecs";
import { GAME_RULES } from "../../config";
import { Cooldowns } from "../components";
import { GameClockResource } from "../resources";

export const CooldownSystem = defineSystem("Cooldown")
  .priority(100)
  .execute((_dt, world) => {
    const now = world.resources.require(GameClockResource).elapsed;

    for (const [, cooldowns] of world.query(Cooldowns)) {
      if (cooldowns.gcdExpiresAt > 0 && cooldowns.gcdExpiresAt <= now) {
        cooldowns.gcdExpiresAt = 0;
      }
      for (const [action, entry] of cooldowns.active) {
        if (entry.expiresAt <= now) cooldowns.active.delete(action);
      }
    }
  });

/**
 * Entities without a Cooldowns component can always act.
 */
export function canAct(world: World, entity: Entity, action: string): boolean {
  const cooldowns = world.getComponent(entity, Cooldowns);
  if (!cooldowns) return true;

  const now = world.resources.require(GameClockResource).elapsed;
  if (cooldowns.gcdExpiresAt > now) return false;

  const entry = cooldowns.active.get(action);
  return !entry || entry.expiresAt <= now;
}

export function triggerCooldown(
  world: World,
  entity: Entity,
  action: string,
  duration: number,
  gcd: number = GAME_RULES.COMBAT.GLOBAL_COOLDOWN,
): void {
  const cooldowns = world.getComponent(entity, Cooldowns);
  if (!cooldowns) return;

  const now = world.resources.require(GameClockResource).elapsed;
  cooldowns.active.set(action, { expiresAt: now + duration, duration });
  cooldowns.gcdExpiresAt = now + gcd;
}
