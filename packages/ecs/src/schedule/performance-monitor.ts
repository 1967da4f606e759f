import type { SystemTimings } from "./scheduler";

export interface TickStats {
  tickNumber: number;
  startTime: number;
  endTime: number;
  /** All durations in milliseconds. */
  targetDuration: number;
  actualDuration: number;
  systemTimes: SystemTimings;
  entityCount: number;
  overran: boolean;
  /** Share of the tick budget used, in percent. */
  efficiency: number;
}

export interface PerformanceReport {
  targetTps: number;
  totalTicks: number;
  overrunCount: number;
  avgTickTimeMs: number;
  avgTps: number;
  overrunRatePct: number;
  systemAvgTimesMs: Record<string, number>;
  recentEntityCount: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Rolling window over the most recent ticks. Observational only.
 */
export class PerformanceMonitor {
  private readonly history: TickStats[] = [];
  private head = 0;
  private total = 0;
  private overruns = 0;

  constructor(
    readonly targetTps: number,
    readonly maxHistory = 100,
  ) {}

  record(stats: TickStats): void {
    if (this.history.length < this.maxHistory) {
      this.history.push(stats);
    } else {
      this.history[this.head] = stats;
      this.head = (this.head + 1) % this.maxHistory;
    }
    this.total++;
    if (stats.overran) this.overruns++;
  }

  get totalTicks(): number {
    return this.total;
  }

  get overrunCount(): number {
    return this.overruns;
  }

  /** Oldest first. */
  getHistory(): TickStats[] {
    return [...this.history.slice(this.head), ...this.history.slice(0, this.head)];
  }

  getLatest(): TickStats | undefined {
    if (this.history.length === 0) return undefined;
    const index =
      this.history.length < this.maxHistory
        ? this.history.length - 1
        : (this.head + this.maxHistory - 1) % this.maxHistory;
    return this.history[index];
  }

  getAverageTickTime(): number {
    if (this.history.length === 0) return 0;
    let sum = 0;
    for (const t of this.history) sum += t.actualDuration;
    return sum / this.history.length;
  }

  getAverageTickRate(): number {
    const avg = this.getAverageTickTime();
    return avg === 0 ? 0 : 1000 / avg;
  }

  /** Percent of all recorded ticks that overran. */
  getOverrunRate(): number {
    return this.total === 0 ? 0 : (this.overruns / this.total) * 100;
  }

  getSystemAverages(): Record<string, number> {
    const totals = new Map<string, { sum: number; count: number }>();
    for (const tick of this.history) {
      for (const [name, duration] of Object.entries(tick.systemTimes)) {
        const entry = totals.get(name) ?? { sum: 0, count: 0 };
        entry.sum += duration;
        entry.count++;
        totals.set(name, entry);
      }
    }
    const averages: Record<string, number> = {};
    for (const [name, { sum, count }] of totals) averages[name] = sum / count;
    return averages;
  }

  getReport(): PerformanceReport {
    const systemAvgTimesMs: Record<string, number> = {};
    for (const [name, avg] of Object.entries(this.getSystemAverages())) {
      systemAvgTimesMs[name] = round2(avg);
    }
    return {
      targetTps: this.targetTps,
      totalTicks: this.total,
      overrunCount: this.overruns,
      avgTickTimeMs: round2(this.getAverageTickTime()),
      avgTps: round2(this.getAverageTickRate()),
      overrunRatePct: round2(this.getOverrunRate()),
      systemAvgTimesMs,
      recentEntityCount: this.getLatest()?.entityCount ?? 0,
    };
  }

  reset(): void {
    this.history.length = 0;
    this.head = 0;
    this.total = 0;
    this.overruns = 0;
  }
}
