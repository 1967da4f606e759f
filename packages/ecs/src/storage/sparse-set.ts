import type { Entity } from "../core/types";

/**
 * Entity ids and their payloads in aligned dense arrays, with a sparse
 * entity → dense index map. O(1) add/remove/has; removal swaps the last
 * element into the hole, so dense order follows insertion until the
 * first removal.
 */
export class SparseSet<T> {
  private readonly denseIndexByEntity = new Map<Entity, number>();
  private readonly denseEntities: Entity[] = [];
  private readonly denseData: T[] = [];

  get size(): number {
    return this.denseEntities.length;
  }

  has(entity: Entity): boolean {
    return this.denseIndexByEntity.has(entity);
  }

  get(entity: Entity): T | undefined {
    const denseIndex = this.denseIndexByEntity.get(entity);
    if (denseIndex === undefined) return undefined;
    return this.denseData[denseIndex];
  }

  /** Inserts or overwrites. Returns the dense index. */
  set(entity: Entity, data: T): number {
    const existing = this.denseIndexByEntity.get(entity);
    if (existing !== undefined) {
      this.denseData[existing] = data;
      return existing;
    }
    const denseIndex = this.denseEntities.length;
    this.denseEntities.push(entity);
    this.denseData.push(data);
    this.denseIndexByEntity.set(entity, denseIndex);
    return denseIndex;
  }

  remove(entity: Entity): boolean {
    const denseIndex = this.denseIndexByEntity.get(entity);
    if (denseIndex === undefined) return false;

    const lastIndex = this.denseEntities.length - 1;
    if (denseIndex !== lastIndex) {
      const lastEntity = this.denseEntities[lastIndex];
      this.denseEntities[denseIndex] = lastEntity;
      this.denseData[denseIndex] = this.denseData[lastIndex];
      this.denseIndexByEntity.set(lastEntity, denseIndex);
    }
    this.denseEntities.pop();
    this.denseData.pop();
    this.denseIndexByEntity.delete(entity);
    return true;
  }

  clear(): void {
    this.denseIndexByEntity.clear();
    this.denseEntities.length = 0;
    this.denseData.length = 0;
  }

  getDenseEntities(): readonly Entity[] {
    return this.denseEntities;
  }

  getDenseData(): readonly T[] {
    return this.denseData;
  }
}
