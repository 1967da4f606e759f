/**
 * Network Sync Manager
 *
 * Builds what each session gets to see: the full snapshot sent on entering
 * the game, and the per-tick delta.
 *
 * A delta carries the complete data of the session's own entity and of
 * every entity in its area of interest rather than a field-level diff. Removals are derived from the
 * previous delta, so clients can drop entities that left the area.
 */

import type {
  ChatLine,
  EntityData,
  GameEvent,
  GameStateData,
  GameStateDeltaData,
} from "@ashfall/contracts";
import { aabbAround, aabbContains, type Entity, type Vec3, type World } from "@ashfall/ecs";
import { Position, Vision } from "../components";
import { toEntityData } from "../player";
import { type TickEvent, SpatialIndexResource, TerrainResource } from "../resources";
import type { GameSession } from "./game-session";

// =============================================================================
// Types
// =============================================================================

export interface SyncOptions {
  /** Radius of the entity area of interest. */
  aoiRadius: number;
  /** Radius of the terrain sent with full state; caps each entity's Vision. */
  visionRadius: number;
  /** Chat lines replayed in full state (default 20). */
  chatHistory?: number;
}

// =============================================================================
// NetworkSyncManager Class
// =============================================================================

export class NetworkSyncManager {
  private readonly world: World;
  private readonly options: Required<SyncOptions>;
  private readonly recentChat: ChatLine[] = [];

  constructor(world: World, options: SyncOptions) {
    this.world = world;
    this.options = { chatHistory: 20, ...options };
  }

  get aoiRadius(): number {
    return this.options.aoiRadius;
  }

  // ---------------------------------------------------------------------------
  // Area of Interest
  // ---------------------------------------------------------------------------

  /**
   * Entities in the cube of half-width `aoiRadius` around `entity`,
   * excluding the entity itself.
   */
  getAreaOfInterest(entity: Entity): Entity[] {
    const pos = this.world.getComponent(entity, Position);
    if (!pos) return [];

    const spatial = this.world.resources.require(SpatialIndexResource);
    return spatial
      .queryRadius(pos.x, pos.y, pos.z, this.options.aoiRadius)
      .filter((other) => other !== entity && this.world.isAlive(other));
  }

  /** Whether `point` lies within `viewer`'s area of interest. */
  isInAreaOfInterest(viewer: Entity, point: Vec3): boolean {
    const pos = this.world.getComponent(viewer, Position);
    if (!pos) return false;
    return aabbContains(aabbAround(pos, this.options.aoiRadius), point.x, point.y, point.z);
  }

  // ---------------------------------------------------------------------------
  // Chat History
  // ---------------------------------------------------------------------------

  recordChat(line: ChatLine): void {
    this.recentChat.push(line);
    const overflow = this.recentChat.length - this.options.chatHistory;
    if (overflow > 0) this.recentChat.splice(0, overflow);
  }

  getRecentChat(): ChatLine[] {
    return [...this.recentChat];
  }

  // ---------------------------------------------------------------------------
  // Full State
  // ---------------------------------------------------------------------------

  /**
   * Snapshot for a session entering (or re-requesting) the game. Resets
   * the session's delta baseline to the entities included.
   */
  getFullState(session: GameSession, tick: number): GameStateData | null {
    const entity = session.entity;
    if (entity === null) return null;

    const player = toEntityData(this.world, entity);
    if (!player) return null;

    const { entities, ids } = this.serialize(this.getAreaOfInterest(entity));
    session.lastAoi = ids;

    const vision = this.world.getComponent(entity, Vision);
    const radius = Math.min(vision?.radius ?? Infinity, this.options.visionRadius);
    const terrain = this.world.resources.get(TerrainResource);
    const tiles = terrain
      ? terrain.getVisibleTiles(
          Math.floor(player.x),
          Math.floor(player.y),
          Math.floor(player.z),
          radius,
        )
      : {};

    return {
      tick,
      player,
      entities,
      world_tiles: tiles,
      messages: this.getRecentChat(),
    };
  }

  // ---------------------------------------------------------------------------
  // Delta
  // ---------------------------------------------------------------------------

  /**
   * Delta for one session at the end of a tick. Events without an origin
   * reach every session.
   *
   * @returns null when the session has no live entity
   */
  getStateDelta(
    session: GameSession,
    tick: number,
    events: readonly TickEvent[],
  ): GameStateDeltaData | null {
    const entity = session.entity;
    if (entity === null || !this.world.isAlive(entity)) return null;

    // The session's own entity leads the list so movement shows up too.
    const { entities, ids } = this.serialize([entity, ...this.getAreaOfInterest(entity)]);

    const removed: number[] = [];
    for (const previous of session.lastAoi) {
      if (!ids.has(previous)) removed.push(previous);
    }
    session.lastAoi = ids;

    const visible: GameEvent[] = [];
    for (const { event, origin } of events) {
      if (origin === null || this.isInAreaOfInterest(entity, origin)) {
        visible.push(event);
      }
    }

    return {
      tick,
      changed_entities: entities,
      removed_entities: removed,
      changed_tiles: {},
      events: visible,
    };
  }

  private serialize(candidates: readonly Entity[]): {
    entities: EntityData[];
    ids: Set<Entity>;
  } {
    const entities: EntityData[] = [];
    const ids = new Set<Entity>();
    for (const candidate of candidates) {
      const data = toEntityData(this.world, candidate);
      if (!data) continue;
      entities.push(data);
      ids.add(candidate);
    }
    return { entities, ids };
  }
}
