// Histogram bucket upper bounds shared by every measured blockstore.

/** Latency bounds in milliseconds, 0.01 ms to 60 s */
export const LATENCY_BUCKETS: readonly number[] = [
  0.01, 0.05, 0.1, 0.3, 0.6, 0.8, 1, 2, 3, 4, 5, 6, 8, 10, 13, 16, 32, 64, 128, 256, 500, 1000,
  2000, 3000, 5000, 10000, 20000, 30000, 40000, 50000, 60000,
];

/** Size bounds: 64 B, 4 KiB, 256 KiB, 16 MiB (also used for batch item counts) */
export const SIZE_BUCKETS: readonly number[] = [2 ** 6, 2 ** 12, 2 ** 18, 2 ** 24];
