// Blockstore wrapper that records call counts, error counts, latency and size
// distributions for every operation, then forwards the call unchanged.
//
// Metric names: `<prefix>.<op>_total`, `<prefix>.<op>.errors_total`,
// `<prefix>.<op>.latency_seconds` (observed in milliseconds) and, for sized
// operations, `<prefix>.<op>.size_bytes` / `<prefix>.deletemany.size_items`.

import { isNotFound } from '../blockstore/errors.js';
import {
  isBatchDeleter,
  isCloser,
  isHealthChecker,
  isViewer,
  type AllKeysOptions,
  type BatchDeleter,
  type Block,
  type Blockstore,
  type Cid,
  type Closer,
  type HealthChecker,
  type ViewCallback,
  type Viewer,
} from '../blockstore/types.js';
import { createPrometheusMetrics } from '../metrics/prometheus.js';
import type { Counter, Histogram, MetricsFactory } from '../metrics/types.js';

import { LATENCY_BUCKETS, SIZE_BUCKETS } from './buckets.js';

interface OperationMetrics {
  total: Counter;
  errors: Counter;
  latency: Histogram;
}

interface SizedOperationMetrics extends OperationMetrics {
  size: Histogram;
}

interface RecordOptions<T> {
  /** Runs after the call is counted, before delegating */
  observeBefore?: () => void;
  /** Runs only when the backend call succeeds */
  observeAfter?: (result: T) => void;
  /** Do not count BLOCK_NOT_FOUND as an error */
  exemptNotFound?: boolean;
}

/** Optional backend capabilities detected when the wrapper was built */
export interface BlockstoreCapabilities {
  batchDelete: boolean;
  view: boolean;
  close: boolean;
  healthCheck: boolean;
}

function recordLatency(histogram: Histogram, start: number): void {
  histogram.observe(performance.now() - start);
}

function operationMetrics(
  metrics: MetricsFactory,
  prefix: string,
  op: string,
  method: string
): OperationMetrics {
  return {
    total: metrics.counter(`${prefix}.${op}_total`, `Total number of Blockstore.${method} calls`),
    errors: metrics.counter(
      `${prefix}.${op}.errors_total`,
      `Number of errored Blockstore.${method} calls`
    ),
    latency: metrics.histogram(
      `${prefix}.${op}.latency_seconds`,
      `Latency distribution of Blockstore.${method} calls`,
      LATENCY_BUCKETS
    ),
  };
}

function sizedOperationMetrics(
  metrics: MetricsFactory,
  prefix: string,
  op: string,
  method: string,
  size: { suffix: string; help: string }
): SizedOperationMetrics {
  return {
    ...operationMetrics(metrics, prefix, op, method),
    size: metrics.histogram(`${prefix}.${op}.${size.suffix}`, size.help, SIZE_BUCKETS),
  };
}

export class MeasuredBlockstore implements Blockstore, BatchDeleter, Viewer, Closer, HealthChecker {
  readonly capabilities: BlockstoreCapabilities;

  private readonly backend: Blockstore;
  private readonly batchDeleter: BatchDeleter | undefined;
  private readonly viewer: Viewer | undefined;
  private readonly closer: Closer | undefined;
  private readonly healthChecker: HealthChecker | undefined;

  private readonly putMetrics: SizedOperationMetrics;
  private readonly putManyMetrics: SizedOperationMetrics;
  private readonly getMetrics: SizedOperationMetrics;
  private readonly hasMetrics: OperationMetrics;
  private readonly getSizeMetrics: OperationMetrics;
  private readonly deleteMetrics: OperationMetrics;
  private readonly deleteManyMetrics: SizedOperationMetrics;
  private readonly viewMetrics: OperationMetrics;

  constructor(prefix: string, backend: Blockstore, metrics: MetricsFactory) {
    this.backend = backend;

    // Capability set is fixed for the backend's lifetime
    this.batchDeleter = isBatchDeleter(backend) ? backend : undefined;
    this.viewer = isViewer(backend) ? backend : undefined;
    this.closer = isCloser(backend) ? backend : undefined;
    this.healthChecker = isHealthChecker(backend) ? backend : undefined;
    this.capabilities = {
      batchDelete: this.batchDeleter !== undefined,
      view: this.viewer !== undefined,
      close: this.closer !== undefined,
      healthCheck: this.healthChecker !== undefined,
    };

    this.putMetrics = sizedOperationMetrics(metrics, prefix, 'put', 'Put', {
      suffix: 'size_bytes',
      help: 'Size distribution of stored byte slices',
    });
    this.putManyMetrics = sizedOperationMetrics(metrics, prefix, 'putmany', 'PutMany', {
      suffix: 'size_bytes',
      help: 'Size distribution of Blockstore.PutMany batch sizes',
    });
    this.getMetrics = sizedOperationMetrics(metrics, prefix, 'get', 'Get', {
      suffix: 'size_bytes',
      help: 'Size distribution of retrieved byte slices',
    });
    this.hasMetrics = operationMetrics(metrics, prefix, 'has', 'Has');
    this.getSizeMetrics = operationMetrics(metrics, prefix, 'getsize', 'GetSize');
    this.deleteMetrics = operationMetrics(metrics, prefix, 'delete', 'Delete');
    this.deleteManyMetrics = sizedOperationMetrics(metrics, prefix, 'deletemany', 'DeleteMany', {
      suffix: 'size_items',
      help: 'Size distribution of batch delete calls',
    });
    this.viewMetrics = operationMetrics(metrics, prefix, 'view', 'View');
  }

  put(block: Block): Promise<void> {
    return this.record(this.putMetrics, () => this.backend.put(block), {
      observeBefore: () => this.putMetrics.size.observe(block.data.byteLength),
    });
  }

  putMany(blocks: readonly Block[]): Promise<void> {
    return this.record(this.putManyMetrics, () => this.backend.putMany(blocks), {
      observeBefore: () => this.putManyMetrics.size.observe(blocks.length),
    });
  }

  get(cid: Cid): Promise<Block> {
    return this.record(this.getMetrics, () => this.backend.get(cid), {
      observeAfter: (block) => this.getMetrics.size.observe(block.data.byteLength),
      exemptNotFound: true,
    });
  }

  has(cid: Cid): Promise<boolean> {
    return this.record(this.hasMetrics, () => this.backend.has(cid));
  }

  getSize(cid: Cid): Promise<number> {
    return this.record(this.getSizeMetrics, () => this.backend.getSize(cid), {
      exemptNotFound: true,
    });
  }

  deleteBlock(cid: Cid): Promise<void> {
    return this.record(this.deleteMetrics, () => this.backend.deleteBlock(cid));
  }

  /**
   * Batched delete when the backend supports it. Otherwise deletes one block
   * at a time through {@link deleteBlock}, stopping at the first failure;
   * blocks deleted before the failure stay deleted.
   */
  async deleteMany(cids: readonly Cid[]): Promise<void> {
    const deleter = this.batchDeleter;
    if (!deleter) {
      for (const cid of cids) {
        await this.deleteBlock(cid);
      }
      return;
    }

    return this.record(this.deleteManyMetrics, () => deleter.deleteMany(cids), {
      observeBefore: () => this.deleteManyMetrics.size.observe(cids.length),
      exemptNotFound: true,
    });
  }

  /**
   * Zero-copy read when the backend supports it. Otherwise reads the whole
   * block through {@link get} and hands its payload to `fn`; only the get
   * metrics move in that case.
   */
  async view<T>(cid: Cid, fn: ViewCallback<T>): Promise<T> {
    const viewer = this.viewer;
    if (!viewer) {
      const block = await this.get(cid);
      return fn(block.data);
    }

    return this.record(this.viewMetrics, () => viewer.view(cid, fn), { exemptNotFound: true });
  }

  allKeys(options?: AllKeysOptions): AsyncIterable<Cid> {
    return this.backend.allKeys(options);
  }

  hashOnRead(enabled: boolean): void {
    this.backend.hashOnRead(enabled);
  }

  async close(): Promise<void> {
    if (this.closer) {
      await this.closer.close();
    }
  }

  async healthy(): Promise<boolean> {
    if (!this.healthChecker) return true;
    return this.healthChecker.healthy();
  }

  private async record<T>(
    op: OperationMetrics,
    call: () => Promise<T>,
    options: RecordOptions<T> = {}
  ): Promise<T> {
    const start = performance.now();
    try {
      op.total.inc();
      options.observeBefore?.();
      const result = await call();
      options.observeAfter?.(result);
      return result;
    } catch (err) {
      if (!(options.exemptNotFound && isNotFound(err))) {
        op.errors.inc();
      }
      throw err;
    } finally {
      recordLatency(op.latency, start);
    }
  }
}

/**
 * Wrap a blockstore, registering its metrics under `prefix` and a dot.
 * The prefix must be unique per wrapped blockstore within a metrics sink;
 * a duplicate is rejected here, at construction.
 */
export function newMeasuredBlockstore(
  prefix: string,
  backend: Blockstore,
  metrics: MetricsFactory = createPrometheusMetrics()
): MeasuredBlockstore {
  return new MeasuredBlockstore(prefix, backend, metrics);
}
