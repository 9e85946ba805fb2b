/**
 * @fileoverview Latest-wins rate limiting between two channels
 *
 * `toRateLimitedChannel` reads an input channel and re-emits at most one
 * value per `delay` on a new output channel. When several values arrive
 * inside one window only the newest is forwarded; the rest are dropped.
 * The first value is forwarded as soon as it arrives.
 *
 * A single worker task mediates between the two endpoints:
 *
 * ```
 * producer -> Sender ==> Receiver -> worker -> Sender ==> Receiver -> consumer
 * ```
 *
 * It runs until one side closes. Closing every input sender ends the output
 * stream; closing the output receiver stops the worker on its next forward,
 * after which sends to the input resolve `'closed'`.
 *
 * @example
 * ```typescript
 * const { sender, receiver } = createChannel<SensorReading>();
 * const readings = toRateLimitedChannel(receiver, 1000);
 *
 * sensor.on('sample', sample => sender.trySend(sample));
 *
 * for await (const reading of readings) {
 *   render(reading); // at most once per second, always the latest sample
 * }
 * ```
 */

import { createChannel, Receiver, Sender } from './channel';
import { ErrorCode, RateLimitedChannelError } from './errors';
import { Logger, logger as defaultLogger } from './logger';

/** Output queue bound used when none is configured */
export const DEFAULT_OUTPUT_CAPACITY = 100;

export interface RateLimitedChannelConfig {
  /** Minimum spacing between two forwarded values, in milliseconds */
  readonly delay: number;
  /** Output channel capacity */
  readonly capacity?: number;
  readonly logger?: Logger;
}

export type RateLimitedChannelOptions = Omit<RateLimitedChannelConfig, 'delay'>;

export type RateLimiterWorkerConfig = Pick<RateLimitedChannelConfig, 'delay' | 'logger'>;

export type WorkerState = 'idle' | 'holding' | 'stopped';

/**
 * Why a worker stopped. `failed` only follows an unexpected exception, such
 * as another reader competing for the input channel.
 */
export type WorkerExitReason = 'input-closed' | 'output-closed' | 'failed';

export interface WorkerStatus {
  readonly state: WorkerState;
  /** Values sent on the output */
  readonly forwarded: number;
  /** Pending values replaced by a newer arrival */
  readonly coalesced: number;
  readonly exitReason: WorkerExitReason | undefined;
}

function validateDelay(delay: number): void {
  if (!Number.isFinite(delay) || delay < 0) {
    throw new RateLimitedChannelError(
      ErrorCode.INVALID_DELAY,
      `Delay must be a finite, non-negative number of milliseconds, got ${delay}`,
      { delay }
    );
  }
}

/**
 * The task that moves values from `input` to `output`.
 *
 * Between forwards it holds at most one pending value. While the window
 * since the last forward is still open it waits for either a newer value
 * (which replaces the pending one) or the end of the window, whichever
 * comes first.
 */
export class RateLimiterWorker<T> {
  private readonly delay: number;
  private readonly log: Logger;
  private state: WorkerState = 'idle';
  private forwarded = 0;
  private coalesced = 0;
  private exitReason: WorkerExitReason | undefined;
  private running: Promise<WorkerExitReason> | undefined;

  constructor(
    private readonly input: Receiver<T>,
    private readonly output: Sender<T>,
    config: RateLimiterWorkerConfig
  ) {
    validateDelay(config.delay);
    this.delay = config.delay;
    this.log = config.logger ?? defaultLogger;
  }

  /**
   * Starts the worker. Repeated calls return the same promise, which
   * resolves once both endpoints have been released.
   *
   * @returns Promise resolving to the reason the worker stopped; it never rejects
   */
  public run(): Promise<WorkerExitReason> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  public getStatus(): WorkerStatus {
    return {
      state: this.state,
      forwarded: this.forwarded,
      coalesced: this.coalesced,
      exitReason: this.exitReason
    };
  }

  private async execute(): Promise<WorkerExitReason> {
    this.log.debug('Rate limiter worker started', { delay: this.delay });

    let reason: WorkerExitReason;
    try {
      reason = await this.forwardLatest();
    } catch (error) {
      this.log.error('Rate limiter worker failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      reason = 'failed';
    } finally {
      this.output.close();
      this.input.close();
    }

    this.state = 'stopped';
    this.exitReason = reason;
    this.log.debug('Rate limiter worker stopped', {
      reason,
      forwarded: this.forwarded,
      coalesced: this.coalesced
    });
    return reason;
  }

  private async forwardLatest(): Promise<WorkerExitReason> {
    // Monotonic clock; backdated so the first value goes out immediately
    let lastForward = performance.now() - this.delay;

    for (;;) {
      this.state = 'idle';
      const first = await this.input.recv();
      if (first.status === 'closed') return 'input-closed';

      this.state = 'holding';
      let pending = first.value;

      for (;;) {
        const now = performance.now();
        const elapsed = now - lastForward;

        if (elapsed >= this.delay) {
          // The window starts when the forward starts, not when a full output frees up
          if ((await this.output.send(pending)) === 'closed') return 'output-closed';
          lastForward = now;
          this.forwarded++;
          break;
        }

        const next = await this.input.recv(this.delay - elapsed);
        // The pending value is dropped with the input
        if (next.status === 'closed') return 'input-closed';
        if (next.status === 'received') {
          pending = next.value;
          this.coalesced++;
        }
      }
    }
  }
}

/**
 * Factory function taking the full configuration object.
 *
 * @param input - Channel to read
 * @param config - Delay plus optional capacity and logger
 * @returns Receiver for the throttled stream
 * @throws RateLimitedChannelError for a negative or non-finite delay, or an
 * invalid capacity
 */
export function createRateLimitedChannel<T>(
  input: Receiver<T>,
  config: RateLimitedChannelConfig
): Receiver<T> {
  const { sender, receiver } = createChannel<T>({
    capacity: config.capacity ?? DEFAULT_OUTPUT_CAPACITY
  });
  const worker = new RateLimiterWorker(input, sender, config);

  // run() settles only with an exit reason; failures are logged inside
  void worker.run();

  return receiver;
}

/**
 * Wraps `input` in a channel that yields at most one value per `delay`
 * milliseconds, always the most recent one.
 *
 * @param input - Channel to read; the returned channel takes over as its only reader
 * @param delay - Minimum spacing between two forwarded values, in milliseconds
 * @param options - Output capacity and logger overrides
 * @returns Receiver for the throttled stream; it ends when `input` closes
 * @throws RateLimitedChannelError for a negative or non-finite delay, or an
 * invalid capacity
 *
 * @example
 * ```typescript
 * const latest = toRateLimitedChannel(updates, 100, { capacity: 1 });
 * ```
 */
export function toRateLimitedChannel<T>(
  input: Receiver<T>,
  delay: number,
  options: RateLimitedChannelOptions = {}
): Receiver<T> {
  return createRateLimitedChannel(input, { ...options, delay });
}

/**
 * Delay presets for common update sources.
 */
export const RateLimitedChannelPresets = {
  /** Roughly one value per display frame */
  animationFrame: { delay: 16 },

  /** UI state that should feel live without re-rendering on every change */
  uiUpdate: { delay: 100 },

  /** Periodic hardware or sensor sampling */
  sensor: { delay: 1000 },

  telemetry: { delay: 5000 }
} as const;

export type RateLimitedChannelPresetKey = keyof typeof RateLimitedChannelPresets;
