import type { Logger } from 'pino';

/**
 * Fire-and-forget counters and histograms, shaped after a statsd client.
 */
export interface MetricsSink {
  increment(name: string, tags: ReadonlyArray<string>, sampleRate: number): void;
  histogram(
    name: string,
    value: number,
    tags: ReadonlyArray<string>,
    sampleRate: number,
  ): void;
}

export const noopMetrics: MetricsSink = {
  increment() {},
  histogram() {},
};

/**
 * Guards a sink so that its failures never reach a request.
 */
export class SafeMetrics implements MetricsSink {
  constructor(
    private readonly sink: MetricsSink,
    private readonly logger: Logger,
  ) {}

  increment(name: string, tags: ReadonlyArray<string>, sampleRate: number): void {
    try {
      this.sink.increment(name, tags, sampleRate);
    } catch (error) {
      this.logger.debug({ err: error, metric: name }, 'metrics sink rejected counter');
    }
  }

  histogram(
    name: string,
    value: number,
    tags: ReadonlyArray<string>,
    sampleRate: number,
  ): void {
    try {
      this.sink.histogram(name, value, tags, sampleRate);
    } catch (error) {
      this.logger.debug({ err: error, metric: name }, 'metrics sink rejected histogram');
    }
  }
}
