/**
 * Stage timing for site builds
 */

export interface PerfMeasurement {
  stage: string;
  durationMs: number;
  detail?: string;
}

export interface StageSummary {
  count: number;
  total: number;
  mean: number;
  max: number;
}

export class PerfMonitor {
  private measurements: PerfMeasurement[] = [];
  private enabled: boolean;
  private log: (message: string) => void;

  constructor(enabled = false, log: (message: string) => void = message => console.error(message)) {
    this.enabled = enabled;
    this.log = log;
  }

  /**
   * Time an async stage
   */
  async timeAsync<T>(stage: string, fn: () => Promise<T>, detail?: string): Promise<T> {
    if (!this.enabled) return fn();

    const start = performance.now();
    const result = await fn();
    this.record(stage, performance.now() - start, detail);
    return result;
  }

  record(stage: string, durationMs: number, detail?: string): void {
    if (!this.enabled) return;

    this.measurements.push({ stage, durationMs, detail });

    const suffix = detail ? ` ${detail}` : '';
    this.log(`[perf] ${stage}: ${durationMs.toFixed(2)}ms${suffix}`);
  }

  getMeasurements(): PerfMeasurement[] {
    return [...this.measurements];
  }

  summary(): Record<string, StageSummary> {
    const result: Record<string, StageSummary> = {};

    for (const { stage, durationMs } of this.measurements) {
      const entry = result[stage] ?? { count: 0, total: 0, mean: 0, max: 0 };
      entry.count += 1;
      entry.total += durationMs;
      entry.mean = entry.total / entry.count;
      entry.max = Math.max(entry.max, durationMs);
      result[stage] = entry;
    }

    return result;
  }
}
