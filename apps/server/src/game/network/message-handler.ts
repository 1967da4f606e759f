/**
 * Message Handler
 *
 * Applies queued player actions to the world. Runs on the simulation side,
 * at the start of a tick, so every mutation happens in tick order.
 *
 * Actions are checked again here: between being queued and being applied
 * the player may have disconnected and its entity id been handed out
 * again.
 */

import type { InteractData, InventoryData, SystemMessageLevel } from "@ashfall/contracts";
import type { Entity, World } from "@ashfall/ecs";
import {
  CombatState,
  Dead,
  Identity,
  Inventory,
  Player,
  Position,
  Sprite,
} from "../components";
import { despawnEntity } from "../player";
import { SpatialIndexResource, TerrainResource, TickEventsResource } from "../resources";
import { moveEntity } from "../systems";
import type { PlayerAction } from "./action-queue";

// =============================================================================
// Types
// =============================================================================

/**
 * Sends feedback to the session owning `connectionId`.
 */
export type ActionFeedback = (
  connectionId: string,
  message: string,
  level: SystemMessageLevel,
) => void;

// =============================================================================
// MessageHandler Class
// =============================================================================

export class MessageHandler {
  private readonly world: World;
  private readonly feedback: ActionFeedback;

  constructor(world: World, feedback: ActionFeedback) {
    this.world = world;
    this.feedback = feedback;
  }

  // ---------------------------------------------------------------------------
  // Main Entry Point
  // ---------------------------------------------------------------------------

  /**
   * Apply a drained batch in arrival order. A failing action is logged and
   * the rest of the batch still runs.
   */
  applyActions(actions: readonly PlayerAction[]): void {
    for (const action of actions) {
      if (!this.ownsEntity(action.connectionId, action.entity)) continue;

      try {
        this.apply(action);
      } catch (error) {
        console.error(
          `[MessageHandler] Failed to apply ${action.kind} for ${action.connectionId}:`,
          error,
        );
      }
    }
  }

  private apply(action: PlayerAction): void {
    switch (action.kind) {
      case "move":
        moveEntity(this.world, action.entity, action.dx, action.dy, action.dz);
        return;
      case "attack":
        this.setAttackTarget(action.connectionId, action.entity, action.targetId);
        return;
      case "interact":
        this.interact(action.connectionId, action.entity, action.data);
        return;
      case "pickup":
        this.pickup(action.connectionId, action.entity, action.data);
        return;
    }
  }

  private ownsEntity(connectionId: string, entity: Entity): boolean {
    if (!this.world.isAlive(entity)) return false;
    return this.world.getComponent(entity, Player)?.connectionId === connectionId;
  }

  // ---------------------------------------------------------------------------
  // Combat
  // ---------------------------------------------------------------------------

  private setAttackTarget(connectionId: string, entity: Entity, targetId: number): void {
    const combat = this.world.getComponent(entity, CombatState);
    if (!combat || this.world.hasComponent(entity, Dead)) return;

    const valid =
      targetId !== entity &&
      this.world.isAlive(targetId) &&
      this.world.hasComponent(targetId, CombatState) &&
      !this.world.hasComponent(targetId, Dead);

    if (!valid) {
      this.feedback(connectionId, "Invalid target.", "warning");
      return;
    }

    combat.target = targetId;
    this.world.getComponent(targetId, CombatState)?.targetedBy.add(entity);
  }

  // ---------------------------------------------------------------------------
  // Interaction
  // ---------------------------------------------------------------------------

  private interact(connectionId: string, entity: Entity, data: InteractData): void {
    if (data.target_id !== undefined) {
      const identity = this.world.isAlive(data.target_id)
        ? this.world.getComponent(data.target_id, Identity)
        : undefined;
      if (!identity) {
        this.feedback(connectionId, "Nothing there.", "warning");
        return;
      }
      const description = identity.description ? ` ${identity.description}` : "";
      this.feedback(connectionId, `You see ${identity.name}.${description}`, "info");
      return;
    }

    const pos = this.world.getComponent(entity, Position);
    if (!pos) return;

    const x = data.x ?? Math.floor(pos.x);
    const y = data.y ?? Math.floor(pos.y);
    const z = data.z ?? Math.floor(pos.z);
    const tile = this.world.resources.get(TerrainResource)?.getTile(x, y, z);
    if (!tile) {
      this.feedback(connectionId, "Nothing there.", "warning");
      return;
    }
    this.feedback(connectionId, `You see ${tile.name}.`, "info");
  }

  // ---------------------------------------------------------------------------
  // Items
  // ---------------------------------------------------------------------------

  /**
   * Pick up an item lying on the player's tile: the one named by
   * `item_id`, or the first found.
   */
  private pickup(connectionId: string, entity: Entity, data: InventoryData): void {
    const pos = this.world.getComponent(entity, Position);
    const inventory = this.world.getComponent(entity, Inventory);
    if (!pos || !inventory) return;

    const item = this.findItemAt(pos.x, pos.y, pos.z, data.item_id);
    if (item === null) {
      this.feedback(connectionId, "There is nothing here to pick up.", "warning");
      return;
    }
    if (inventory.items.length >= inventory.maxItems) {
      this.feedback(connectionId, "Your inventory is full.", "warning");
      return;
    }

    const identity = this.world.getComponent(item, Identity);
    const sprite = this.world.getComponent(item, Sprite);
    const itemPos = this.world.getComponent(item, Position);
    if (!identity || !sprite || !itemPos) return;

    inventory.items.push({
      itemId: item,
      templateId: identity.name,
      name: identity.name,
      weight: 1,
      stackCount: 1,
    });

    this.world.resources.get(TickEventsResource)?.push(
      {
        type: "item_picked_up",
        data: {
          item_id: item,
          item_name: identity.name,
          item_char: sprite.char,
          item_color: sprite.color,
          x: itemPos.x,
          y: itemPos.y,
          z: itemPos.z,
        },
      },
      { x: itemPos.x, y: itemPos.y, z: itemPos.z },
    );

    despawnEntity(this.world, item);
    this.feedback(connectionId, `You pick up ${identity.name}.`, "info");
  }

  private findItemAt(x: number, y: number, z: number, itemId?: number): Entity | null {
    const tx = Math.floor(x);
    const ty = Math.floor(y);
    const tz = Math.floor(z);
    const spatial = this.world.resources.require(SpatialIndexResource);

    for (const candidate of spatial.queryPoint(x, y, z)) {
      if (itemId !== undefined && candidate !== itemId) continue;
      if (this.world.getComponent(candidate, Identity)?.entityType !== "item") continue;

      const pos = this.world.getComponent(candidate, Position);
      if (
        pos &&
        Math.floor(pos.x) === tx &&
        Math.floor(pos.y) === ty &&
        Math.floor(pos.z) === tz
      ) {
        return candidate;
      }
    }
    return null;
  }
}
