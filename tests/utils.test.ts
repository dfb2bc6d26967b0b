import { describe, expect, it } from 'vitest';
import { formatPercent, formatUsd, formatUtc } from '../src/utils/format.js';
import { withTimeout } from '../src/utils/timeout.js';

describe('format', () => {
  it('formats USD with grouping and two decimals', () => {
    expect(formatUsd(35_000_000_000)).toBe('35,000,000,000.00');
    expect(formatUsd(0.5)).toBe('0.50');
  });

  it('formats percentages with two decimals', () => {
    expect(formatPercent(30)).toBe('30.00%');
    expect(formatPercent(1.5)).toBe('1.50%');
  });

  it('formats timestamps in UTC', () => {
    expect(formatUtc(new Date('2024-01-05T03:04:05.678Z'))).toBe('2024-01-05 03:04:05 UTC');
  });
});

describe('withTimeout', () => {
  it('resolves with the promise value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 50, () => new Error('late'))).resolves.toBe(42);
  });

  it('rejects with the timeout error when the promise stalls', async () => {
    const stalled = new Promise<number>(() => undefined);

    await expect(withTimeout(stalled, 10, () => new Error('late'))).rejects.toThrow('late');
  });

  it('passes through the promise rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, () => new Error('late'))).rejects.toThrow('boom');
  });
});
