import type { GameEvent } from "@ashfall/contracts";
import type { Vec3 } from "@ashfall/ecs";

/**
 * A gameplay event plus where it happened, so broadcasts can be limited to
 * sessions whose area of interest contains it.
 */
export interface TickEvent {
  event: GameEvent;
  origin: Vec3 | null;
}

/**
 * Events produced during the current tick. Systems push; the post-tick
 * broadcast drains.
 */
export class TickEventLog {
  private events: TickEvent[] = [];

  push(event: GameEvent, origin: Vec3 | null = null): void {
    this.events.push({ event, origin });
  }

  get size(): number {
    return this.events.length;
  }

  peek(): readonly TickEvent[] {
    return this.events;
  }

  drain(): TickEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
