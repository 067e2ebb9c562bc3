export const METRIC_COUNTERS = [
  'constructed',
  'released',
  'reductions',
  'reductionsSkipped',
  'approximationSteps',
] as const;

export type MetricCounter = (typeof METRIC_COUNTERS)[number];

export type MetricsSnapshot = Record<MetricCounter, number>;

export interface MetricsCollectorOptions {
  enabled?: boolean;
}

function emptySnapshot(): MetricsSnapshot {
  return {
    constructed: 0,
    released: 0,
    reductions: 0,
    reductionsSkipped: 0,
    approximationSteps: 0,
  };
}

export class MetricsCollector {
  private readonly enabled: boolean;
  private counters: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.counters = emptySnapshot();
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public increment(counter: MetricCounter, by = 1): void {
    if (!this.enabled) {
      return;
    }
    this.counters[counter] += by;
  }

  /** Fractions constructed but not yet destroyed */
  public live(): number {
    return this.counters.constructed - this.counters.released;
  }

  public snapshot(): MetricsSnapshot {
    return { ...this.counters };
  }

  public reset(): void {
    this.counters = emptySnapshot();
  }
}
