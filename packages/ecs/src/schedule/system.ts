import type { World } from "../core/world";

/**
 * Per-tick logic unit. Higher priority runs earlier in the tick.
 */
export interface System {
  readonly name: string;
  readonly priority: number;
  enabled: boolean;
  /** @param dt - Fixed tick duration in seconds. */
  update(dt: number, world: World): void;
}

type SystemFn = (dt: number, world: World) => void;

interface SystemConfig {
  name: string;
  priority: number;
  enabled: boolean;
}

class SystemBuilder {
  private readonly config: SystemConfig;

  constructor(name: string) {
    this.config = { name, priority: 0, enabled: true };
  }

  priority(priority: number): this {
    this.config.priority = priority;
    return this;
  }

  disabled(): this {
    this.config.enabled = false;
    return this;
  }

  execute(fn: SystemFn): System {
    const { name, priority, enabled } = this.config;
    return { name, priority, enabled, update: fn };
  }
}

/**
 * Define a system with a fluent API.
 *
 * @example
 * const lifetime = defineSystem("Lifetime")
 *   .priority(10)
 *   .execute((dt, world) => {
 *     // ...
 *   });
 */
export function defineSystem(name: string): SystemBuilder {
  return new SystemBuilder(name);
}
