/**
 * Combat System
 *
 * Auto-attacks against each fighter's current target, in melee range and
 * off cooldown. Handles damage, death, experience and level-ups, and
 * records the resulting events for the next broadcast.
 */

import { defineSystem, type Entity, type Vec3, type World } from "@ashfall/ecs";
import { GAME_RULES } from "../../config";
import {
  CombatState,
  Dead,
  Identity,
  Lifetime,
  Position,
  Respawn,
  Stats,
  type StatsData,
} from "../components";
import { GameClockResource, TickEventsResource } from "../resources";
import { canAct, triggerCooldown } from "./cooldown";

const { MELEE_RANGE, XP_PER_VICTIM_LEVEL, XP_CURVE, CORPSE_SECONDS } = GAME_RULES.COMBAT;

export const LEVEL_UP_GAINS = {
  strength: 2,
  constitution: 2,
  dexterity: 1,
} as const;

function positionOf(world: World, entity: Entity): Vec3 | null {
  const pos = world.getComponent(entity, Position);
  return pos ? { x: pos.x, y: pos.y, z: pos.z } : null;
}

function nameOf(world: World, entity: Entity | null): string | null {
  if (entity === null) return null;
  return world.getComponent(entity, Identity)?.name ?? null;
}

export function calculateDamage(amount: number, armor: number): number {
  return Math.max(1, amount - armor);
}

/**
 * Apply damage after armor. Kills the target when hp reaches zero.
 *
 * @returns damage actually dealt, 0 when the target cannot take damage
 */
export function applyDamage(
  world: World,
  target: Entity,
  source: Entity | null,
  amount: number,
  damageType = "physical",
): number {
  const combat = world.getComponent(target, CombatState);
  const stats = world.getComponent(target, Stats);
  if (!combat || !stats || world.hasComponent(target, Dead)) return 0;

  const dealt = calculateDamage(amount, stats.armor);
  combat.hp = Math.max(0, combat.hp - dealt);

  if (source !== null && source !== target) {
    combat.threat.set(source, (combat.threat.get(source) ?? 0) + dealt);
    combat.targetedBy.add(source);
  }

  world.resources.get(TickEventsResource)?.push(
    {
      type: "damage_event",
      data: {
        target_id: target,
        source_id: source,
        amount: dealt,
        damage_type: damageType,
        current_hp: combat.hp,
        max_hp: stats.maxHp,
      },
    },
    positionOf(world, target),
  );

  if (combat.hp === 0) handleDeath(world, target, source);
  return dealt;
}

/**
 * Mark an entity dead. Entities that never respawn are left as a corpse
 * that the lifetime system removes after a while.
 */
export function handleDeath(world: World, entity: Entity, killer: Entity | null): void {
  const now = world.resources.get(GameClockResource)?.elapsed ?? 0;
  world.addComponent(entity, Dead, { timeOfDeath: now, killer });
  if (!world.hasComponent(entity, Respawn)) {
    world.addComponent(entity, Lifetime, { createdAt: now, duration: CORPSE_SECONDS });
  }

  world.resources.get(TickEventsResource)?.push(
    {
      type: "death_event",
      data: {
        entity_id: entity,
        killer_id: killer,
        entity_name: nameOf(world, entity) ?? `Entity ${entity}`,
        killer_name: nameOf(world, killer),
      },
    },
    positionOf(world, entity),
  );

  console.log(`[Combat] Entity ${entity} died (killed by ${killer ?? "environment"})`);

  if (killer !== null) awardExperience(world, killer, entity);
}

export function awardExperience(world: World, recipient: Entity, victim: Entity): void {
  const stats = world.getComponent(recipient, Stats);
  const victimStats = world.getComponent(victim, Stats);
  if (!stats || !victimStats) return;

  stats.experience += victimStats.level * XP_PER_VICTIM_LEVEL;

  while (stats.experience >= stats.experienceToNext) {
    stats.experience -= stats.experienceToNext;
    stats.level += 1;
    stats.experienceToNext = Math.floor(stats.experienceToNext * XP_CURVE);
    levelUp(world, recipient, stats);
  }
}

/**
 * Raise base attributes, recompute derived values and heal to full.
 */
export function levelUp(world: World, entity: Entity, stats: StatsData): void {
  stats.strength += LEVEL_UP_GAINS.strength;
  stats.constitution += LEVEL_UP_GAINS.constitution;
  stats.dexterity += LEVEL_UP_GAINS.dexterity;

  stats.maxHp = 100 + stats.constitution * 10 + stats.level * 5;
  stats.maxMp = 50 + stats.intelligence * 5 + stats.level * 3;
  stats.attackPower = 10 + stats.strength * 2;
  stats.armor = Math.floor(stats.constitution / 2);

  const combat = world.getComponent(entity, CombatState);
  if (combat) {
    combat.hp = stats.maxHp;
    combat.mp = stats.maxMp;
  }

  world.resources.get(TickEventsResource)?.push(
    {
      type: "level_up_event",
      data: { entity_id: entity, new_level: stats.level, stat_gains: { ...LEVEL_UP_GAINS } },
    },
    positionOf(world, entity),
  );

  console.log(`[Combat] Entity ${entity} reached level ${stats.level}`);
}

function distance(a: Vec3, b: Vec3): number {
  return Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z);
}

export const CombatSystem = defineSystem("Combat")
  .priority(80)
  .execute((_dt, world) => {
    const now = world.resources.require(GameClockResource).elapsed;
    const events = world.resources.get(TickEventsResource);

    for (const [entity, combat, stats] of world.query(CombatState, Stats)) {
      const target = combat.target;
      if (target === null) continue;
      if (world.hasComponent(entity, Dead)) continue;

      if (!world.isAlive(target) || world.hasComponent(target, Dead)) {
        combat.target = null;
        combat.inCombat = false;
        continue;
      }

      if (!canAct(world, entity, "attack")) continue;

      const pos = world.getComponent(entity, Position);
      const targetPos = world.getComponent(target, Position);
      if (!pos || !targetPos || distance(pos, targetPos) > MELEE_RANGE) continue;

      const dealt = applyDamage(world, target, entity, stats.attackPower);
      if (dealt === 0) continue;

      events?.push(
        {
          type: "combat_event",
          data: {
            attacker_id: entity,
            defender_id: target,
            damage: dealt,
            damage_type: "physical",
            hit: true,
            critical: false,
          },
        },
        { x: targetPos.x, y: targetPos.y, z: targetPos.z },
      );

      triggerCooldown(world, entity, "attack", 1 / stats.attackSpeed);
      combat.inCombat = true;
      combat.lastCombatTime = now;
    }
  });
