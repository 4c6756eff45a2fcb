export { LATENCY_BUCKETS, SIZE_BUCKETS } from './buckets.js';
export {
  MeasuredBlockstore,
  newMeasuredBlockstore,
  type BlockstoreCapabilities,
} from './measured-blockstore.js';
