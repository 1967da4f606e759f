/**
 * Game Loop
 *
 * Fixed-timestep driver for the system scheduler. Every tick runs the
 * pre-tick hooks, all systems, then the post-tick hooks, strictly in
 * sequence. A slow tick is never skipped: the loop stops sleeping and
 * free-runs until it has caught up.
 */

import { LoopStateError } from "../core/errors";
import type { World } from "../core/world";
import { PerformanceMonitor, type TickStats } from "./performance-monitor";
import { type Clock, defaultClock, type SystemScheduler } from "./scheduler";

export type GameLoopState = "stopped" | "starting" | "running" | "stopping";

export type TickStartHook = (tick: number) => void;
export type TickEndHook = (tick: number, stats: TickStats) => void;

export interface GameLoopOptions {
  /** Ticks per second (default 20). */
  tickRate?: number;
  /** Ticks kept by the performance monitor (default 100). */
  historyLength?: number;
  clock?: Clock;
}

/** Elapsed time beyond this multiple of the target is a critical overrun. */
export const CRITICAL_OVERRUN_FACTOR = 1.5;

export class GameLoop {
  readonly tickRate: number;
  /** Target tick duration in milliseconds. */
  readonly tickDuration: number;
  readonly performance: PerformanceMonitor;

  private loopState: GameLoopState = "stopped";
  private tick = 0;
  private readonly clock: Clock;
  private readonly tickStartHooks: TickStartHook[] = [];
  private readonly tickEndHooks: TickEndHook[] = [];

  private loopPromise: Promise<void> | null = null;
  private sleepTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    readonly world: World,
    readonly scheduler: SystemScheduler,
    options: GameLoopOptions = {},
  ) {
    this.tickRate = options.tickRate ?? 20;
    if (!(this.tickRate > 0)) {
      throw new Error(`GameLoop: tick rate must be positive, got ${this.tickRate}`);
    }
    this.tickDuration = 1000 / this.tickRate;
    this.clock = options.clock ?? defaultClock;
    this.performance = new PerformanceMonitor(
      this.tickRate,
      options.historyLength ?? 100,
    );
  }

  get state(): GameLoopState {
    return this.loopState;
  }

  get currentTick(): number {
    return this.tick;
  }

  // ---------------------------------------------------------------------------
  // Hooks
  // ---------------------------------------------------------------------------

  /** Returns an unsubscribe function. */
  onTickStart(hook: TickStartHook): () => void {
    this.tickStartHooks.push(hook);
    return () => removeItem(this.tickStartHooks, hook);
  }

  /** Returns an unsubscribe function. */
  onTickEnd(hook: TickEndHook): () => void {
    this.tickEndHooks.push(hook);
    return () => removeItem(this.tickEndHooks, hook);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Starts ticking. The returned promise settles once the loop has fully
   * stopped again.
   */
  start(): Promise<void> {
    if (this.loopState !== "stopped") {
      throw new LoopStateError(this.loopState, "start");
    }
    this.loopState = "starting";
    this.tick = 0;
    console.log(
      `[GameLoop] Starting at ${this.tickRate} TPS (${this.tickDuration.toFixed(1)}ms per tick)`,
    );
    this.loopState = "running";
    this.loopPromise = this.run();
    return this.loopPromise;
  }

  /** Lets the in-flight tick finish, then resolves once stopped. */
  stop(): Promise<void> {
    if (this.loopState !== "running") {
      throw new LoopStateError(this.loopState, "stop");
    }
    this.loopState = "stopping";
    console.log("[GameLoop] Stopping...");
    this.interruptSleep();
    return this.loopPromise ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    try {
      while (this.loopState === "running") {
        const started = this.clock();
        const stats = this.runTick();
        const elapsed = this.clock() - started;

        if (elapsed > this.tickDuration * CRITICAL_OVERRUN_FACTOR) {
          const systems = Object.entries(stats.systemTimes)
            .map(([name, ms]) => `${name}=${ms.toFixed(2)}ms`)
            .join(", ");
          console.error(
            `[GameLoop] Critically slow tick ${stats.tickNumber}: ${elapsed.toFixed(2)}ms (${systems})`,
          );
        }

        // Zero-length sleeps still yield so socket I/O is serviced.
        await this.sleep(Math.max(0, this.tickDuration - elapsed));
      }
    } finally {
      this.loopState = "stopped";
      this.loopPromise = null;
      console.log("[GameLoop] Stopped");
    }
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  /**
   * Runs one tick synchronously and advances the tick counter. Hook and
   * system failures are logged; the tick always completes.
   */
  runTick(): TickStats {
    const tickNumber = this.tick;
    const startTime = this.clock();

    for (const hook of [...this.tickStartHooks]) {
      try {
        hook(tickNumber);
      } catch (error) {
        console.error(`[GameLoop] Tick start hook failed on tick ${tickNumber}:`, error);
      }
    }

    const systemTimes = this.scheduler.update(this.tickDuration / 1000, this.world);

    const endTime = this.clock();
    const actualDuration = endTime - startTime;
    const stats: TickStats = {
      tickNumber,
      startTime,
      endTime,
      targetDuration: this.tickDuration,
      actualDuration,
      systemTimes,
      entityCount: this.world.getEntityCount(),
      overran: actualDuration > this.tickDuration,
      efficiency: (actualDuration / this.tickDuration) * 100,
    };

    for (const hook of [...this.tickEndHooks]) {
      try {
        hook(tickNumber, stats);
      } catch (error) {
        console.error(`[GameLoop] Tick end hook failed on tick ${tickNumber}:`, error);
      }
    }

    this.performance.record(stats);
    if (stats.overran) {
      console.warn(
        `[GameLoop] Tick ${tickNumber} overran: ${actualDuration.toFixed(2)}ms (target: ${this.tickDuration.toFixed(2)}ms)`,
      );
    }

    this.tick++;
    return stats;
  }

  // ---------------------------------------------------------------------------
  // Sleep
  // ---------------------------------------------------------------------------

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private interruptSleep(): void {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function removeItem<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
}
