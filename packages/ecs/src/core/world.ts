import { Resources } from "../storage/resources";
import { SparseSet } from "../storage/sparse-set";
import { EntityPool } from "./entity-pool";
import { StoreError } from "./errors";
import type {
  AnyComponentType,
  ComponentKey,
  ComponentTuple,
  ComponentType,
  Entity,
} from "./types";

interface ComponentRecord {
  readonly type: AnyComponentType;
  readonly storage: SparseSet<unknown>;
  readonly dependencies: readonly ComponentKey[];
  /** Keys of registered components that list this one as a dependency. */
  readonly dependents: Set<ComponentKey>;
}

export type QueryRow<With extends readonly AnyComponentType[]> = [
  Entity,
  ...ComponentTuple<With>,
];

/**
 * Entity/component store.
 *
 * One sparse set per registered component type. Dependencies between types
 * are checked on add and remove; every mutation either succeeds completely
 * or throws a {@link StoreError} and leaves the store untouched.
 */
export class World {
  private readonly entities = new EntityPool();
  private readonly components = new Map<ComponentKey, ComponentRecord>();
  readonly resources = new Resources();

  // ---------------------------------------------------------------------------
  // Entities
  // ---------------------------------------------------------------------------

  createEntity(): Entity {
    return this.entities.create();
  }

  /** Removes every component, then frees the id. No-op for inactive ids. */
  destroyEntity(entity: Entity): void {
    if (!this.entities.isAlive(entity)) return;
    for (const record of this.components.values()) {
      record.storage.remove(entity);
    }
    this.entities.release(entity);
  }

  isAlive(entity: Entity): boolean {
    return this.entities.isAlive(entity);
  }

  getEntityCount(): number {
    return this.entities.size;
  }

  getEntities(): Entity[] {
    return [...this.entities.entities()];
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Registers a component type. Later calls for the same key are ignored,
   * including their dependency lists.
   */
  registerComponent<T>(
    type: ComponentType<T>,
    dependencies: readonly AnyComponentType[] = type.requires,
  ): void {
    if (this.components.has(type.key)) return;

    for (const dependency of dependencies) {
      this.registerComponent(dependency);
    }

    const dependencyKeys = dependencies.map((d) => d.key);
    this.components.set(type.key, {
      type,
      storage: new SparseSet<unknown>(),
      dependencies: dependencyKeys,
      dependents: new Set(),
    });

    for (const key of dependencyKeys) {
      this.components.get(key)?.dependents.add(type.key);
    }
  }

  isRegistered(type: AnyComponentType): boolean {
    return this.components.has(type.key);
  }

  getDependencies(type: AnyComponentType): readonly ComponentKey[] {
    return this.components.get(type.key)?.dependencies ?? [];
  }

  // ---------------------------------------------------------------------------
  // Components
  // ---------------------------------------------------------------------------

  /** Attaches or replaces a component. */
  addComponent<T>(entity: Entity, type: ComponentType<T>, value: T): void {
    if (!this.entities.isAlive(entity)) {
      throw StoreError.unknownEntity(entity, `add ${type.key}`);
    }
    const record = this.ensureRecord(type);
    for (const key of record.dependencies) {
      if (!this.components.get(key)?.storage.has(entity)) {
        throw StoreError.dependencyMissing(entity, type.key, key);
      }
    }
    record.storage.set(entity, value);
  }

  /** Returns false when the component was not attached. */
  removeComponent<T>(entity: Entity, type: ComponentType<T>): boolean {
    if (!this.entities.isAlive(entity)) {
      throw StoreError.unknownEntity(entity, `remove ${type.key}`);
    }
    const record = this.components.get(type.key);
    if (!record || !record.storage.has(entity)) return false;

    const blocking: ComponentKey[] = [];
    for (const key of record.dependents) {
      if (this.components.get(key)?.storage.has(entity)) blocking.push(key);
    }
    if (blocking.length > 0) {
      throw StoreError.dependencyViolation(entity, type.key, blocking);
    }
    return record.storage.remove(entity);
  }

  getComponent<T>(entity: Entity, type: ComponentType<T>): T | undefined {
    const storage = this.storageFor(type);
    return storage?.get(entity);
  }

  hasComponent(entity: Entity, type: AnyComponentType): boolean {
    return this.components.get(type.key)?.storage.has(entity) ?? false;
  }

  /** Component keys currently attached to an entity. */
  getComponentKeys(entity: Entity): ComponentKey[] {
    const keys: ComponentKey[] = [];
    for (const [key, record] of this.components) {
      if (record.storage.has(entity)) keys.push(key);
    }
    return keys;
  }

  getComponentCount(type: AnyComponentType): number {
    return this.components.get(type.key)?.storage.size ?? 0;
  }

  /**
   * Entities holding every listed type, paired with their values.
   *
   * Scans the first type's storage and filters by membership in the others,
   * so rows come back in that storage's dense order. The result is a
   * snapshot: mutating the world while iterating it is safe.
   */
  query<const With extends readonly AnyComponentType[]>(
    ...types: With
  ): QueryRow<With>[] {
    const rows: QueryRow<With>[] = [];
    const [driverType, ...rest] = types;
    if (!driverType) return rows;

    const driver = this.components.get(driverType.key);
    if (!driver) return rows;

    const others: SparseSet<unknown>[] = [];
    for (const type of rest) {
      const record = this.components.get(type.key);
      if (!record) return rows;
      others.push(record.storage);
    }

    const entities = driver.storage.getDenseEntities();
    const data = driver.storage.getDenseData();
    for (let i = 0; i < entities.length; i++) {
      const entity = entities[i];
      const row: unknown[] = [entity, data[i]];
      let matches = true;
      for (const storage of others) {
        if (!storage.has(entity)) {
          matches = false;
          break;
        }
        row.push(storage.get(entity));
      }
      // Each slot was read from the storage registered under the matching key.
      if (matches) rows.push(row as QueryRow<With>);
    }
    return rows;
  }

  clear(): void {
    for (const record of this.components.values()) record.storage.clear();
    this.entities.clear();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private ensureRecord(type: AnyComponentType): ComponentRecord {
    this.registerComponent(type);
    const record = this.components.get(type.key);
    if (!record) {
      throw new Error(`Component registration failed: ${type.key}`);
    }
    return record;
  }

  private storageFor<T>(type: ComponentType<T>): SparseSet<T> | undefined {
    // Storages are created per key and only written through typed add calls.
    return this.components.get(type.key)?.storage as SparseSet<T> | undefined;
  }
}
