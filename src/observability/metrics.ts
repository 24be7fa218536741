export type MetricsSnapshot = {
  startedAt: number;
  uptimeMs: number;
  counters: Record<string, number>;
};

export class MetricsRegistry {
  private readonly startedAtMs = Date.now();
  private readonly counters = new Map<string, number>();

  increment(name: string, value = 1): void {
    const next = (this.counters.get(name) ?? 0) + value;
    this.counters.set(name, next);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    const counters: Record<string, number> = {};
    for (const [k, v] of [...this.counters.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      counters[k] = v;
    }

    return {
      startedAt: this.startedAtMs,
      uptimeMs: Date.now() - this.startedAtMs,
      counters,
    };
  }
}

export const globalMetrics = new MetricsRegistry();
