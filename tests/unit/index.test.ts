import { describe, it, expect } from 'vitest';
import { channelFromIterable, toRateLimitedChannel, RateLimitedChannelError } from '../../src';

describe('public API', () => {
  it('should throttle an iterable source end to end', async () => {
    const output = toRateLimitedChannel(channelFromIterable(['x', 'y', 'z']), 0);

    const values: string[] = [];
    for await (const value of output) {
      values.push(value);
    }

    expect(values).toEqual(['x', 'y', 'z']);
  });

  it('should expose the error class', () => {
    expect(() => toRateLimitedChannel(channelFromIterable([]), -10)).toThrow(RateLimitedChannelError);
  });
});
