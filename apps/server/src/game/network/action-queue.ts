import type { InteractData, InventoryData } from "@ashfall/contracts";
import type { Entity } from "@ashfall/ecs";

interface ActionBase {
  /** Connection that issued the action; the entity must still belong to it when applied. */
  connectionId: string;
  entity: Entity;
  receivedAt: number;
}

export type PlayerAction =
  | (ActionBase & { kind: "move"; dx: number; dy: number; dz: number })
  | (ActionBase & { kind: "attack"; targetId: number })
  | (ActionBase & { kind: "interact"; data: InteractData })
  | (ActionBase & { kind: "pickup"; data: InventoryData });

/**
 * The hand-off point between connection handlers and the simulation.
 * Handlers push at any time; the tick drains everything queued so far in
 * one swap.
 */
export class ActionQueue {
  private pending: PlayerAction[] = [];

  constructor(private readonly capacity: number) {}

  /** @returns false when the queue is full and the action was dropped */
  push(action: PlayerAction): boolean {
    if (this.pending.length >= this.capacity) return false;
    this.pending.push(action);
    return true;
  }

  drain(): PlayerAction[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }
}
