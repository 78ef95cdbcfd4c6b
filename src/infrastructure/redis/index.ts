export { connectRedis, connectBroker, createRedis, onceCloser } from './connection.js';
export { RedisStreamEventSink, DEFAULT_ACK_TIMEOUT_MS } from './event-producer.js';
export type { StreamSinkOptions, StreamWriter } from './event-producer.js';
