export {
  startStreamConsumer,
  ensureConsumerGroups,
  parseStreamEntry,
  processPending,
  processEntry,
  GROUP_NAME,
  STREAM_KEYS,
} from './stream-consumer.js';
export type { BatchResult, ConsumerDeps, ConsumerOptions, StreamClient, StreamRead } from './stream-consumer.js';
