/**
 * @fileoverview Main entry point for rate-limited-channel
 *
 * - Channel: point-to-point async queue with closable sender and receiver
 *   endpoints, consumed with `for await`
 * - toRateLimitedChannel: forwards at most one value per delay, always the
 *   most recent one
 */

// Channel endpoints
export { createChannel, channelFromIterable, Sender, Receiver } from './channel';
export type {
  ChannelConfig,
  ChannelFromIterableConfig,
  ChannelPair,
  ChannelStatus,
  RecvResult,
  SendStatus,
  TimedRecvResult,
  TrySendStatus
} from './channel';

// Rate limiting
export {
  toRateLimitedChannel,
  createRateLimitedChannel,
  RateLimiterWorker,
  RateLimitedChannelPresets,
  DEFAULT_OUTPUT_CAPACITY
} from './rateLimitedChannel';
export type {
  RateLimitedChannelConfig,
  RateLimitedChannelOptions,
  RateLimitedChannelPresetKey,
  RateLimiterWorkerConfig,
  WorkerExitReason,
  WorkerState,
  WorkerStatus
} from './rateLimitedChannel';

export { ErrorCode, RateLimitedChannelError } from './errors';
export { Logger, createLogger, logger } from './logger';
export type { LogLevel, LoggerConfig } from './logger';
