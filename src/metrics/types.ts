// Metrics sink contract consumed by the measured blockstore.
//
// Instruments must tolerate concurrent use; the blockstore wrapper adds no
// coordination of its own.

export interface Counter {
  inc(): void;
}

export interface Histogram {
  observe(value: number): void;
}

/**
 * Creates named instruments. Each name may be registered once per sink;
 * implementations throw at registration time on a duplicate.
 */
export interface MetricsFactory {
  counter(name: string, help: string): Counter;
  histogram(name: string, help: string, buckets: readonly number[]): Histogram;
}
