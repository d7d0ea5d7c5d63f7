import type { MetricsSink } from './metrics-sink.js';

export interface MetricSample {
  name: string;
  value: number;
  tags: Array<string>;
  sampleRate: number;
}

type MetricSnapshot = {
  counters: Record<string, number>;
  histograms: Record<string, Array<number>>;
};

/**
 * Keeps every emitted sample in memory, ignoring sample rates. Meant for tests
 * and local debugging.
 */
export class InMemoryMetricsSink implements MetricsSink {
  readonly counters: Array<MetricSample> = [];
  readonly histograms: Array<MetricSample> = [];

  increment(name: string, tags: ReadonlyArray<string>, sampleRate: number): void {
    this.counters.push({ name, value: 1, tags: [...tags], sampleRate });
  }

  histogram(
    name: string,
    value: number,
    tags: ReadonlyArray<string>,
    sampleRate: number,
  ): void {
    this.histograms.push({ name, value, tags: [...tags], sampleRate });
  }

  count(name: string): number {
    return this.counters.filter((sample) => sample.name === name).length;
  }

  snapshot(): MetricSnapshot {
    const counters: Record<string, number> = {};
    for (const sample of this.counters) {
      counters[sample.name] = (counters[sample.name] ?? 0) + sample.value;
    }

    const histograms: Record<string, Array<number>> = {};
    for (const sample of this.histograms) {
      (histograms[sample.name] ??= []).push(sample.value);
    }

    return { counters, histograms };
  }

  reset(): void {
    this.counters.length = 0;
    this.histograms.length = 0;
  }
}

export type { MetricSnapshot };
