import { z } from 'zod';
import { BaseCollector } from '../BaseCollector.js';
import { HttpClient } from '../../services/HttpClient.js';
import { RateLimiter } from '../../services/RateLimiter.js';
import { systemClock, type Clock, type SnapshotStore } from '../../core/ports.js';
import type { AppConfig } from '../../config/index.js';
import type { ProtocolConfig, ProtocolRegistry, Snapshot } from '../../core/types/protocols.js';

export type DefiLlamaOptions = AppConfig['collectors']['defillama'];

// GET /tvl/{slug} answers with a bare number; some mirrors wrap it
const tvlResponseSchema = z.union([
  z.number().nonnegative(),
  z.object({ tvl: z.number().nonnegative() }).passthrough(),
]);

export type TvlSource = Pick<HttpClient, 'get'>;

export interface DefiLlamaCollectorDeps {
  protocols: ProtocolRegistry;
  store: SnapshotStore;
  options: DefiLlamaOptions;
  client?: TvlSource;
  rateLimiter?: RateLimiter;
  clock?: Clock;
}

export class DefiLlamaCollector extends BaseCollector {
  readonly name = 'DeFiLlama';

  private client: TvlSource;
  private rateLimiter: RateLimiter;
  private clock: Clock;

  constructor(deps: DefiLlamaCollectorDeps) {
    super(deps.protocols, deps.store);
    const { options } = deps;

    this.client =
      deps.client ??
      new HttpClient('DeFiLlama', {
        baseURL: options.baseUrl,
        timeoutMs: options.timeoutMs,
        maxRetries: options.maxRetries,
        retryDelayMs: options.retryDelayMs,
      });
    this.rateLimiter =
      deps.rateLimiter ??
      new RateLimiter('defillama', {
        requestsPerMinute: options.requestsPerMinute,
        taskTimeoutMs: options.timeoutMs * (options.maxRetries + 1),
      });
    this.clock = deps.clock ?? systemClock;
  }

  // Current TVL in USD, or null when the body is not a TVL figure
  async fetchTvl(slug: string): Promise<number | null> {
    const data = await this.rateLimiter.execute(() => this.client.get<unknown>(`/tvl/${encodeURIComponent(slug)}`));

    const parsed = tvlResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Could not extract TVL for ${slug}`);
      return null;
    }
    return typeof parsed.data === 'number' ? parsed.data : parsed.data.tvl;
  }

  protected async fetchSnapshot(protocol: ProtocolConfig): Promise<Snapshot | null> {
    this.logger.info(`Fetching data for ${protocol.name}`);

    const tvl = await this.fetchTvl(protocol.defillamaSlug);
    if (tvl === null) {
      return null;
    }

    // APY and utilization are static placeholders until read on-chain
    return {
      protocolId: protocol.id,
      timestamp: this.clock(),
      tvl,
      apy7d: protocol.metrics?.apy7d ?? null,
      utilization: protocol.type === 'lending' ? (protocol.metrics?.utilization ?? null) : null,
    };
  }
}

export default DefiLlamaCollector;
