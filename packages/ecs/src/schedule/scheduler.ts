import type { World } from "../core/world";
import type { System } from "./system";

export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

/** Milliseconds spent in each system during one update, in run order. */
export type SystemTimings = Record<string, number>;

interface ScheduledSystem {
  readonly system: System;
  readonly sequence: number;
}

/**
 * Runs systems in descending priority order. Systems with equal priority
 * keep their registration order. The order is part of the game rules:
 * cooldowns tick before combat resolves, combat before effects expire.
 */
export class SystemScheduler {
  private entries: ScheduledSystem[] = [];
  private sequence = 0;

  constructor(private readonly clock: Clock = defaultClock) {}

  add(system: System): void {
    if (this.entries.some((e) => e.system.name === system.name)) {
      throw new Error(`System already registered: ${system.name}`);
    }
    this.entries.push({ system, sequence: this.sequence++ });
    this.entries.sort(
      (a, b) => b.system.priority - a.system.priority || a.sequence - b.sequence,
    );
  }

  remove(name: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => e.system.name !== name);
    return this.entries.length !== before;
  }

  get(name: string): System | undefined {
    return this.entries.find((e) => e.system.name === name)?.system;
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const system = this.get(name);
    if (!system) return false;
    system.enabled = enabled;
    return true;
  }

  getSystems(): System[] {
    return this.entries.map((e) => e.system);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Runs every enabled system once and returns per-system wall time. A
   * system that throws is logged and timed; the systems after it still run.
   */
  update(dt: number, world: World): SystemTimings {
    const timings: SystemTimings = {};
    for (const { system } of this.entries) {
      if (!system.enabled) continue;
      const start = this.clock();
      try {
        system.update(dt, world);
      } catch (error) {
        console.error(`[Scheduler] System ${system.name} failed:`, error);
      }
      timings[system.name] = this.clock() - start;
    }
    return timings;
  }
}
