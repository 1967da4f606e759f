import type { Entity } from "../core/types";

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Axis-aligned box, bounds inclusive. */
export interface AABB {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
}

export function aabbContains(box: AABB, x: number, y: number, z: number): boolean {
  return (
    x >= box.minX &&
    x <= box.maxX &&
    y >= box.minY &&
    y <= box.maxY &&
    z >= box.minZ &&
    z <= box.maxZ
  );
}

export function aabbIntersects(a: AABB, b: AABB): boolean {
  return (
    a.minX <= b.maxX &&
    a.maxX >= b.minX &&
    a.minY <= b.maxY &&
    a.maxY >= b.minY &&
    a.minZ <= b.maxZ &&
    a.maxZ >= b.minZ
  );
}

export function aabbAround(center: Vec3, halfWidth: number): AABB {
  return {
    minX: center.x - halfWidth,
    minY: center.y - halfWidth,
    minZ: center.z - halfWidth,
    maxX: center.x + halfWidth,
    maxY: center.y + halfWidth,
    maxZ: center.z + halfWidth,
  };
}

export type PositionLookup = (entity: Entity) => Vec3 | undefined;

export interface SpatialGridStats {
  totalEntities: number;
  totalCells: number;
  avgEntitiesPerCell: number;
  maxEntitiesPerCell: number;
  cellSize: number;
}

type CellKey = string;

/**
 * Unbounded 3D spatial hash grid.
 *
 * Each entity lives in the cell `floor(coord / cellSize)` on every axis. A
 * reverse map gives O(1) removal and moves; empty cells are dropped.
 *
 * `queryRadius` answers with the cube of half-width `radius` around the
 * center, a superset of the sphere. Use `queryRadiusPrecise` when the exact
 * Euclidean distance matters.
 *
 * @example
 * const grid = new SpatialHashGrid(16);
 * grid.insert(player, 8, 8, 0);
 * const nearby = grid.queryRadius(8, 8, 0, 30);
 */
export class SpatialHashGrid {
  private readonly cells = new Map<CellKey, Set<Entity>>();
  private readonly entityCells = new Map<Entity, CellKey>();
  private readonly entityPositions = new Map<Entity, Vec3>();

  readonly cellSize: number;

  constructor(cellSize = 16) {
    if (!(cellSize > 0)) {
      throw new Error(`SpatialHashGrid: cell size must be positive, got ${cellSize}`);
    }
    this.cellSize = cellSize;
  }

  get size(): number {
    return this.entityCells.size;
  }

  private cellCoord(value: number): number {
    return Math.floor(value / this.cellSize);
  }

  private cellKey(cx: number, cy: number, cz: number): CellKey {
    return `${cx},${cy},${cz}`;
  }

  private keyFor(x: number, y: number, z: number): CellKey {
    return this.cellKey(this.cellCoord(x), this.cellCoord(y), this.cellCoord(z));
  }

  private addToCell(key: CellKey, entity: Entity): void {
    let cell = this.cells.get(key);
    if (!cell) {
      cell = new Set();
      this.cells.set(key, cell);
    }
    cell.add(entity);
  }

  private removeFromCell(key: CellKey, entity: Entity): void {
    const cell = this.cells.get(key);
    if (!cell) return;
    cell.delete(entity);
    if (cell.size === 0) this.cells.delete(key);
  }

  /** Inserting an entity already in the grid moves it. */
  insert(entity: Entity, x: number, y: number, z: number): void {
    if (this.entityCells.has(entity)) {
      this.update(entity, x, y, z);
      return;
    }
    const key = this.keyFor(x, y, z);
    this.addToCell(key, entity);
    this.entityCells.set(entity, key);
    this.entityPositions.set(entity, { x, y, z });
  }

  remove(entity: Entity): boolean {
    const key = this.entityCells.get(entity);
    if (key === undefined) return false;
    this.removeFromCell(key, entity);
    this.entityCells.delete(entity);
    this.entityPositions.delete(entity);
    return true;
  }

  /** Records the new position; cell membership changes only on a cell crossing. */
  update(entity: Entity, x: number, y: number, z: number): void {
    const oldKey = this.entityCells.get(entity);
    if (oldKey === undefined) {
      this.insert(entity, x, y, z);
      return;
    }

    this.entityPositions.set(entity, { x, y, z });

    const newKey = this.keyFor(x, y, z);
    if (newKey === oldKey) return;

    this.removeFromCell(oldKey, entity);
    this.addToCell(newKey, entity);
    this.entityCells.set(entity, newKey);
  }

  has(entity: Entity): boolean {
    return this.entityCells.has(entity);
  }

  getPosition(entity: Entity): Vec3 | undefined {
    const pos = this.entityPositions.get(entity);
    return pos ? { ...pos } : undefined;
  }

  /** Cell coordinates as `"cx,cy,cz"`. */
  getCellForEntity(entity: Entity): string | undefined {
    return this.entityCells.get(entity);
  }

  /** Entities sharing the cell that contains the point. */
  queryPoint(x: number, y: number, z: number): Entity[] {
    const cell = this.cells.get(this.keyFor(x, y, z));
    return cell ? [...cell] : [];
  }

  /** Entities whose position lies in the cube of half-width `radius`. */
  queryRadius(x: number, y: number, z: number, radius: number): Entity[] {
    return this.queryAABB(aabbAround({ x, y, z }, radius));
  }

  /**
   * Entities within Euclidean distance `radius`. Positions come from
   * `lookup` when given, otherwise from the grid's own records; entities
   * the lookup does not know are skipped.
   */
  queryRadiusPrecise(
    x: number,
    y: number,
    z: number,
    radius: number,
    lookup?: PositionLookup,
  ): Entity[] {
    const radiusSq = radius * radius;
    const results: Entity[] = [];
    for (const entity of this.queryCells(aabbAround({ x, y, z }, radius))) {
      const pos = lookup ? lookup(entity) : this.entityPositions.get(entity);
      if (!pos) continue;
      const dx = pos.x - x;
      const dy = pos.y - y;
      const dz = pos.z - z;
      if (dx * dx + dy * dy + dz * dz <= radiusSq) results.push(entity);
    }
    return results;
  }

  queryAABB(box: AABB): Entity[] {
    const results: Entity[] = [];
    for (const entity of this.queryCells(box)) {
      const pos = this.entityPositions.get(entity);
      if (pos && aabbContains(box, pos.x, pos.y, pos.z)) results.push(entity);
    }
    return results;
  }

  /** Every entity in the cells overlapping the box, unfiltered. */
  private *queryCells(box: AABB): Generator<Entity> {
    const minX = this.cellCoord(box.minX);
    const minY = this.cellCoord(box.minY);
    const minZ = this.cellCoord(box.minZ);
    const maxX = this.cellCoord(box.maxX);
    const maxY = this.cellCoord(box.maxY);
    const maxZ = this.cellCoord(box.maxZ);

    const span = (maxX - minX + 1) * (maxY - minY + 1) * (maxZ - minZ + 1);
    if (span > this.cells.size) {
      // Sparse grid: walking occupied cells is cheaper than the range.
      for (const [key, cell] of this.cells) {
        const [cx, cy, cz] = key.split(",").map(Number);
        if (
          cx >= minX && cx <= maxX &&
          cy >= minY && cy <= maxY &&
          cz >= minZ && cz <= maxZ
        ) {
          yield* cell;
        }
      }
      return;
    }

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        for (let cz = minZ; cz <= maxZ; cz++) {
          const cell = this.cells.get(this.cellKey(cx, cy, cz));
          if (cell) yield* cell;
        }
      }
    }
  }

  clear(): void {
    this.cells.clear();
    this.entityCells.clear();
    this.entityPositions.clear();
  }

  stats(): SpatialGridStats {
    let total = 0;
    let max = 0;
    for (const cell of this.cells.values()) {
      total += cell.size;
      if (cell.size > max) max = cell.size;
    }
    const totalCells = this.cells.size;
    return {
      totalEntities: this.entityCells.size,
      totalCells,
      avgEntitiesPerCell: totalCells > 0 ? total / totalCells : 0,
      maxEntitiesPerCell: max,
      cellSize: this.cellSize,
    };
  }
}
