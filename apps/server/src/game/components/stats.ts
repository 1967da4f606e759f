/**
 * Stats Components
 *
 * Attributes, derived combat values, health and progression.
 */

import { defineComponent } from "@ashfall/ecs";

export interface StatsData {
  strength: number;
  dexterity: number;
  constitution: number;
  intelligence: number;
  wisdom: number;
  charisma: number;

  maxHp: number;
  maxMp: number;
  armor: number;
  magicResist: number;
  attackPower: number;
  magicPower: number;

  hpRegenPerSec: number;
  mpRegenPerSec: number;
  moveSpeed: number;
  /** Attacks per second. */
  attackSpeed: number;

  level: number;
  experience: number;
  experienceToNext: number;
}

export const Stats = defineComponent<StatsData>("Stats");

export function createStats(overrides: Partial<StatsData> = {}): StatsData {
  return {
    strength: 10,
    dexterity: 10,
    constitution: 10,
    intelligence: 10,
    wisdom: 10,
    charisma: 10,
    maxHp: 100,
    maxMp: 50,
    armor: 0,
    magicResist: 0,
    attackPower: 10,
    magicPower: 10,
    hpRegenPerSec: 0.1,
    mpRegenPerSec: 0.2,
    moveSpeed: 5,
    attackSpeed: 1,
    level: 1,
    experience: 0,
    experienceToNext: 100,
    ...overrides,
  };
}

/**
 * Current health and targeting. Requires Stats.
 */
export interface CombatStateData {
  hp: number;
  mp: number;
  inCombat: boolean;
  lastCombatTime: number;
  target: number | null;
  targetedBy: Set<number>;
  /** Attacker entity → accumulated damage. */
  threat: Map<number, number>;
}

export const CombatState = defineComponent<CombatStateData>("CombatState", {
  requires: [Stats],
});

export function createCombatState(hp: number, mp: number): CombatStateData {
  return {
    hp,
    mp,
    inCombat: false,
    lastCombatTime: 0,
    target: null,
    targetedBy: new Set(),
    threat: new Map(),
  };
}

export interface CooldownEntry {
  expiresAt: number;
  duration: number;
}

/**
 * Per-action cooldowns plus the global cooldown, in simulation seconds.
 */
export interface CooldownsData {
  active: Map<string, CooldownEntry>;
  gcdExpiresAt: number;
}

export const Cooldowns = defineComponent<CooldownsData>("Cooldowns");

export function createCooldowns(): CooldownsData {
  return { active: new Map(), gcdExpiresAt: 0 };
}

/**
 * Dead tag. Added when hp reaches zero.
 */
export interface DeadData {
  timeOfDeath: number;
  killer: number | null;
}

export const Dead = defineComponent<DeadData>("Dead");
