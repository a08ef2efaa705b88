interface ResultLatencySample {
  isFinal: boolean;
  renderMs: number;
  intervalMs: number;
  rendered: boolean;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  results: number;
  finals: number;
  renders: number;
  skippedRenders: number;
  renderMs: PercentileSummary;
  intervalMs: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

export class LatencyTracker {
  private samples: ResultLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: ResultLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    const rendered = this.samples.filter((sample) => sample.rendered);

    return {
      results: this.samples.length,
      finals: this.samples.filter((sample) => sample.isFinal).length,
      renders: rendered.length,
      skippedRenders: this.samples.length - rendered.length,
      renderMs: asSummary(rendered.map((sample) => sample.renderMs)),
      // The first result has no predecessor.
      intervalMs: asSummary(this.samples.slice(1).map((sample) => sample.intervalMs))
    };
  }
}
