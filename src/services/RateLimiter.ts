import PQueue from 'p-queue';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RateLimiter');

const WINDOW_MS = 60000;

export interface RateLimiterOptions {
  requestsPerMinute: number;
  burstLimit?: number;
  // Upper bound on a single queued task, queue wait excluded
  taskTimeoutMs?: number;
}

export class RateLimiter {
  private queue: PQueue;

  constructor(name: string, options: RateLimiterOptions) {
    // Create queue with concurrency based on burst limit
    this.queue = new PQueue({
      concurrency: options.burstLimit ?? 1,
      intervalCap: options.requestsPerMinute,
      interval: WINDOW_MS,
      timeout: options.taskTimeoutMs,
    });

    logger.debug(`RateLimiter ${name} initialized: ${options.requestsPerMinute} req/min`);
  }

  // Execute a function with rate limiting; a task over taskTimeoutMs rejects
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.add(fn, { throwOnTimeout: true });
  }
}

export default RateLimiter;
