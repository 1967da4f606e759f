import { type Entity, NULL_ENTITY } from "./types";

/**
 * Hands out entity ids starting at 1. Freed ids go on a stack and are
 * reused most-recently-freed first.
 */
export class EntityPool {
  private nextId = 1;
  private readonly alive = new Set<Entity>();
  private readonly freeList: Entity[] = [];

  create(): Entity {
    const recycled = this.freeList.pop();
    const id = recycled ?? this.nextId++;
    this.alive.add(id);
    return id;
  }

  /** Returns false when the id was not active. */
  release(id: Entity): boolean {
    if (id === NULL_ENTITY || !this.alive.delete(id)) return false;
    this.freeList.push(id);
    return true;
  }

  isAlive(id: Entity): boolean {
    return this.alive.has(id);
  }

  get size(): number {
    return this.alive.size;
  }

  entities(): IterableIterator<Entity> {
    return this.alive.values();
  }

  clear(): void {
    this.alive.clear();
    this.freeList.length = 0;
    this.nextId = 1;
  }
}
