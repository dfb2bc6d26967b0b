import { describe, expect, it, vi } from 'vitest';
import { DefiLlamaCollector, type DefiLlamaOptions } from '../src/collectors/defillama/DefiLlamaCollector.js';
import { RateLimiter } from '../src/services/RateLimiter.js';
import { InMemorySnapshotStore, T0, fixedClock, makeProtocols } from './helpers.js';
import type { TvlSource } from '../src/collectors/defillama/DefiLlamaCollector.js';

const OPTIONS: DefiLlamaOptions = {
  baseUrl: 'https://api.llama.fi',
  timeoutMs: 1000,
  maxRetries: 0,
  retryDelayMs: 0,
  requestsPerMinute: 100,
};

function collectorWith(client: TvlSource, store = new InMemorySnapshotStore()) {
  const collector = new DefiLlamaCollector({
    protocols: makeProtocols(),
    store,
    options: OPTIONS,
    client,
    rateLimiter: new RateLimiter('test', { requestsPerMinute: 100 }),
    clock: fixedClock(),
  });
  return { collector, store };
}

describe('DefiLlamaCollector', () => {
  it('stores TVL with the configured static metrics', async () => {
    const client = { get: vi.fn().mockResolvedValue(12345.5) };
    const { collector, store } = collectorWith(client);

    await expect(collector.ingestOne('aave-v3')).resolves.toBe(true);
    expect(client.get).toHaveBeenCalledWith('/tvl/aave-v3');
    expect(store.latest('aave-v3')).toEqual({
      protocolId: 'aave-v3',
      timestamp: T0,
      tvl: 12345.5,
      apy7d: 3.45,
      utilization: 0.725,
    });
  });

  it('leaves utilization empty for non-lending protocols', async () => {
    const { collector, store } = collectorWith({ get: vi.fn().mockResolvedValue(4_000_000_000) });

    await collector.ingestOne('uniswap-v3');

    expect(store.latest('uniswap-v3')?.utilization).toBeNull();
    expect(store.latest('uniswap-v3')?.apy7d).toBe(12);
  });

  it('accepts a wrapped TVL body', async () => {
    const { collector } = collectorWith({ get: vi.fn().mockResolvedValue({ tvl: 77, chain: 'ethereum' }) });

    await expect(collector.fetchTvl('aave-v3')).resolves.toBe(77);
  });

  it('skips a body without a TVL figure', async () => {
    const { collector, store } = collectorWith({ get: vi.fn().mockResolvedValue({ message: 'Protocol not found' }) });

    await expect(collector.ingestOne('aave-v3')).resolves.toBe(false);
    expect(store.latest('aave-v3')).toBeNull();
  });

  it('reports false for a snapshot already stored at that instant', async () => {
    const { collector } = collectorWith({ get: vi.fn().mockResolvedValue(1) });

    await collector.ingestOne('aave-v3');

    await expect(collector.ingestOne('aave-v3')).resolves.toBe(false);
  });

  it('reports false for an unknown protocol without calling the API', async () => {
    const client = { get: vi.fn().mockResolvedValue(1) };
    const { collector } = collectorWith(client);

    await expect(collector.ingestOne('toString')).resolves.toBe(false);
    expect(client.get).not.toHaveBeenCalled();
  });

  it('isolates a failed request to its protocol', async () => {
    const client = {
      get: vi.fn().mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(4_000_000_000),
    };
    const { collector } = collectorWith(client);

    await expect(collector.ingestAll()).resolves.toEqual({ 'aave-v3': false, 'uniswap-v3': true });
    expect(collector.getStatus()).toMatchObject({
      name: 'DeFiLlama',
      totalCollections: 1,
      totalErrors: 1,
      lastErrorAt: expect.any(Date),
    });
  });

  it('keeps the last error until the next success', async () => {
    const { collector } = collectorWith({ get: vi.fn().mockRejectedValue(new Error('socket hang up')) });

    await collector.ingestOne('aave-v3');

    expect(collector.getStatus().lastError).toBe('socket hang up');
  });
});

describe('RateLimiter', () => {
  it('runs tasks and returns their results', async () => {
    const limiter = new RateLimiter('test', { requestsPerMinute: 2 });

    await expect(limiter.execute(async () => 'first')).resolves.toBe('first');
    await expect(limiter.execute(async () => 'second')).resolves.toBe('second');
  });

  it('rejects a task that outlives the task timeout', async () => {
    const limiter = new RateLimiter('test', { requestsPerMinute: 10, taskTimeoutMs: 10 });

    await expect(limiter.execute(() => new Promise<string>(() => undefined))).rejects.toThrow();
  });

  it('propagates task errors', async () => {
    const limiter = new RateLimiter('test', { requestsPerMinute: 10 });

    await expect(limiter.execute(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });
});
