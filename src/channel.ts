/**
 * @fileoverview Point-to-point async channel with sender and receiver endpoints
 *
 * A channel is a FIFO queue shared by any number of `Sender` handles and a
 * single `Receiver`. Closure is part of the data model rather than an
 * exception:
 *
 * - the channel closes for reading once every sender handle is closed and
 *   the buffer is drained;
 * - closing the receiver discards the buffer and makes every pending and
 *   future send resolve `'closed'`.
 *
 * The receiver implements `AsyncIterable`, so the usual way to consume a
 * channel is `for await`. Leaving the loop early closes the receiver.
 *
 * @example
 * ```typescript
 * const { sender, receiver } = createChannel<number>({ capacity: 10 });
 *
 * void (async () => {
 *   for (let i = 0; i < 3; i++) await sender.send(i);
 *   sender.close();
 * })();
 *
 * for await (const value of receiver) {
 *   console.log(value); // 0, 1, 2
 * }
 * ```
 */

import { ErrorCode, RateLimitedChannelError } from './errors';
import { Logger, logger as defaultLogger } from './logger';

export type RecvResult<T> =
  | { readonly status: 'received'; readonly value: T }
  | { readonly status: 'closed' };

export type TimedRecvResult<T> = RecvResult<T> | { readonly status: 'timeout' };

export type SendStatus = 'sent' | 'closed';

export type TrySendStatus = SendStatus | 'full';

export interface ChannelConfig {
  /**
   * Maximum number of buffered values. Omitted or `Infinity` means
   * unbounded, `0` makes every send wait for a receive.
   */
  readonly capacity?: number;
}

export interface ChannelStatus {
  /** Values waiting in the buffer */
  readonly buffered: number;
  /** Sends suspended on a full buffer */
  readonly blockedSenders: number;
  readonly capacity: number;
  /** Open sender handles */
  readonly senders: number;
  /** Whether the receiver has been closed */
  readonly closed: boolean;
}

export interface ChannelPair<T> {
  readonly sender: Sender<T>;
  readonly receiver: Receiver<T>;
}

interface BlockedSend<T> {
  readonly value: T;
  readonly resolve: (status: SendStatus) => void;
}

interface PendingReceive<T> {
  readonly resolve: (result: TimedRecvResult<T>) => void;
  timeoutId?: NodeJS.Timeout;
}

// setTimeout fires after 1ms for anything larger
const MAX_TIMEOUT = 2_147_483_647;

const CLOSED = { status: 'closed' } as const;
const TIMEOUT = { status: 'timeout' } as const;

/**
 * Normalizes a configured capacity, rejecting values a queue cannot have.
 */
export function resolveCapacity(capacity: number | undefined): number {
  if (capacity === undefined || capacity === Infinity) {
    return Infinity;
  }
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new RateLimitedChannelError(
      ErrorCode.INVALID_CAPACITY,
      `Channel capacity must be a non-negative integer or Infinity, got ${capacity}`,
      { capacity }
    );
  }
  return capacity;
}

/**
 * State shared by the endpoints of one channel. Use `createChannel` rather
 * than constructing this directly.
 */
export class ChannelCore<T> {
  private readonly buffer: T[] = [];
  private readonly blockedSends: BlockedSend<T>[] = [];
  private waiting: PendingReceive<T> | undefined;
  private senderCount = 1;
  private receiverClosed = false;

  constructor(public readonly capacity: number) {}

  public get isReceiverClosed(): boolean {
    return this.receiverClosed;
  }

  public send(value: T): Promise<SendStatus> {
    const status = this.trySend(value);
    if (status !== 'full') {
      return Promise.resolve(status);
    }
    return new Promise(resolve => {
      this.blockedSends.push({ value, resolve });
    });
  }

  public trySend(value: T): TrySendStatus {
    if (this.receiverClosed) return 'closed';

    // A waiting receive implies an empty buffer
    if (this.deliver({ status: 'received', value })) return 'sent';

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return 'sent';
    }
    return 'full';
  }

  public recv(timeout?: number): Promise<TimedRecvResult<T>> {
    if (this.waiting) {
      return Promise.reject(
        new RateLimitedChannelError(
          ErrorCode.CONCURRENT_RECEIVE,
          'Receive already in progress on this channel'
        )
      );
    }

    const ready = this.take();
    if (ready) {
      return Promise.resolve(ready);
    }

    return new Promise(resolve => {
      const pending: PendingReceive<T> = { resolve };
      if (timeout !== undefined) {
        pending.timeoutId = setTimeout(() => {
          if (this.waiting === pending) {
            this.waiting = undefined;
            resolve(TIMEOUT);
          }
        }, Math.min(Math.max(0, timeout), MAX_TIMEOUT));
      }
      this.waiting = pending;
    });
  }

  public addSender(): void {
    this.senderCount++;
  }

  public releaseSender(): void {
    this.senderCount--;
    if (this.senderCount === 0 && this.buffer.length === 0 && this.blockedSends.length === 0) {
      this.deliver(CLOSED);
    }
  }

  public closeReceiver(): void {
    if (this.receiverClosed) return;
    this.receiverClosed = true;
    this.buffer.length = 0;

    const blocked = this.blockedSends.splice(0);
    for (const send of blocked) {
      send.resolve('closed');
    }
    this.deliver(CLOSED);
  }

  public getStatus(): ChannelStatus {
    return {
      buffered: this.buffer.length,
      blockedSenders: this.blockedSends.length,
      capacity: this.capacity,
      senders: this.senderCount,
      closed: this.receiverClosed
    };
  }

  /**
   * Takes the next value without waiting, or reports closure.
   * Returns undefined when the caller has to wait.
   */
  private take(): RecvResult<T> | undefined {
    if (this.receiverClosed) return CLOSED;

    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      const admitted = this.blockedSends.shift();
      if (admitted) {
        this.buffer.push(admitted.value);
        admitted.resolve('sent');
      }
      return { status: 'received', value };
    }

    // Rendezvous channels hand values straight from a suspended send
    const direct = this.blockedSends.shift();
    if (direct) {
      direct.resolve('sent');
      return { status: 'received', value: direct.value };
    }

    return this.senderCount === 0 ? CLOSED : undefined;
  }

  private deliver(result: RecvResult<T>): boolean {
    const pending = this.waiting;
    if (!pending) return false;
    this.waiting = undefined;
    clearTimeout(pending.timeoutId);
    pending.resolve(result);
    return true;
  }
}

/**
 * Producer handle. Each handle is closed independently; the channel stays
 * open for reading while any handle remains open.
 */
export class Sender<T> {
  private closed = false;

  constructor(private readonly core: ChannelCore<T>) {}

  /** True once this handle or the receiver has been closed */
  public get isClosed(): boolean {
    return this.closed || this.core.isReceiverClosed;
  }

  /**
   * Sends a value, waiting for buffer space when the channel is full.
   *
   * @param value - Value to enqueue
   * @returns `'sent'` once the value is buffered or handed to the receiver,
   * `'closed'` if this handle or the receiver is (or becomes) closed
   */
  public send(value: T): Promise<SendStatus> {
    if (this.closed) {
      return Promise.resolve('closed');
    }
    return this.core.send(value);
  }

  /**
   * Non-waiting form of `send`.
   *
   * @param value - Value to enqueue
   * @returns `'full'` instead of waiting when there is no room
   */
  public trySend(value: T): TrySendStatus {
    if (this.closed) return 'closed';
    return this.core.trySend(value);
  }

  /**
   * Creates another producer handle on the same channel.
   *
   * @returns A new handle that must be closed on its own
   * @throws RateLimitedChannelError when this handle is already closed
   */
  public clone(): Sender<T> {
    if (this.closed) {
      throw new RateLimitedChannelError(
        ErrorCode.SENDER_CLOSED,
        'Cannot clone a closed sender'
      );
    }
    this.core.addSender();
    return new Sender(this.core);
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.core.releaseSender();
  }
}

/**
 * Consumer handle. Only one receive may be pending at a time.
 */
export class Receiver<T> implements AsyncIterable<T> {
  constructor(private readonly core: ChannelCore<T>) {}

  public get isClosed(): boolean {
    return this.core.isReceiverClosed;
  }

  /**
   * Waits for the next value. With a timeout, resolves `{ status: 'timeout' }`
   * if nothing arrives in time; the value that arrives later stays queued.
   *
   * @param timeoutMs - Optional wait limit in milliseconds
   * @returns The next value, or `closed` once every sender is gone and the
   * buffer is drained
   * @throws RateLimitedChannelError (as a rejection) when another receive is pending
   */
  public recv(): Promise<RecvResult<T>>;
  public recv(timeoutMs: number): Promise<TimedRecvResult<T>>;
  public recv(timeoutMs?: number): Promise<TimedRecvResult<T>> {
    return this.core.recv(timeoutMs);
  }

  public close(): void {
    this.core.closeReceiver();
  }

  public getStatus(): ChannelStatus {
    return this.core.getStatus();
  }

  /**
   * Yields values until the channel closes. Exiting the loop early closes
   * the receiver.
   */
  public async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        const result = await this.recv();
        if (result.status === 'closed') return;
        yield result.value;
      }
    } finally {
      this.close();
    }
  }
}

/**
 * Factory function for creating a channel.
 *
 * @param config - Optional capacity; unbounded when omitted
 * @returns The first sender handle and the receiver
 * @throws RateLimitedChannelError for an invalid capacity
 */
export function createChannel<T>(config: ChannelConfig = {}): ChannelPair<T> {
  const core = new ChannelCore<T>(resolveCapacity(config.capacity));
  return {
    sender: new Sender(core),
    receiver: new Receiver(core)
  };
}

export interface ChannelFromIterableConfig extends ChannelConfig {
  readonly logger?: Logger;
}

/**
 * Feeds an iterable into a new channel. The channel closes when the source
 * is exhausted or throws; closing the receiver stops the source.
 *
 * @param source - Values to pump, sync or async
 * @param config - Capacity and the logger that reports a failing source
 * @returns Receiver over the source's values
 */
export function channelFromIterable<T>(
  source: Iterable<T> | AsyncIterable<T>,
  config: ChannelFromIterableConfig = {}
): Receiver<T> {
  const { sender, receiver } = createChannel<T>(config);
  const log = config.logger ?? defaultLogger;

  void pump(source, sender)
    .catch((error: unknown) => {
      log.error('Source iterable failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    })
    .finally(() => sender.close());

  return receiver;
}

async function pump<T>(source: Iterable<T> | AsyncIterable<T>, sender: Sender<T>): Promise<void> {
  for await (const value of source) {
    if ((await sender.send(value)) === 'closed') break;
  }
}
