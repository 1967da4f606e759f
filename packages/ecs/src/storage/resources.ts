export interface ResourceKey<_T> {
  readonly key: string;
}

export function defineResource<T>(key: string): ResourceKey<T> {
  return { key };
}

/** World-scoped singletons shared by systems (spatial index, event buffers). */
export class Resources {
  private readonly items = new Map<string, unknown>();

  set<T>(resource: ResourceKey<T>, value: T): void {
    this.items.set(resource.key, value);
  }

  get<T>(resource: ResourceKey<T>): T | undefined {
    // Only set() writes under a key, and it is typed by the same ResourceKey.
    return this.items.get(resource.key) as T | undefined;
  }

  require<T>(resource: ResourceKey<T>): T {
    const value = this.get(resource);
    if (value === undefined) {
      throw new Error(`Resource not registered: ${resource.key}`);
    }
    return value;
  }

  has<T>(resource: ResourceKey<T>): boolean {
    return this.items.has(resource.key);
  }

  delete<T>(resource: ResourceKey<T>): boolean {
    return this.items.delete(resource.key);
  }
}
