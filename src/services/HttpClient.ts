import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse, type AxiosError } from 'axios';
import axiosRetry from 'axios-retry';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('HttpClient');

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
  // Base of the exponential backoff between retries
  retryDelayMs?: number;
  headers?: Record<string, string>;
  // Log only the origin of each URL; webhook paths carry credentials
  redactPaths?: boolean;
}

// Rate limited answers are retried too, but only for idempotent requests
export function isRetryable(error: AxiosError): boolean {
  if (axiosRetry.isNetworkError(error)) {
    return true;
  }
  return (
    axiosRetry.isIdempotentRequestError(error) ||
    (error.response?.status === 429 && error.config?.method?.toLowerCase() === 'get')
  );
}

export class HttpClient {
  private client: AxiosInstance;
  private name: string;
  private redactPaths: boolean;

  constructor(name: string, options: HttpClientOptions = {}) {
    this.name = name;
    this.redactPaths = options.redactPaths ?? false;

    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'Protocol-Monitor/1.0',
        ...options.headers,
      },
    });

    axiosRetry(this.client, {
      retries: options.maxRetries ?? 3,
      retryDelay: (retryCount) => {
        const delay = (options.retryDelayMs ?? 1000) * Math.pow(2, retryCount - 1);
        logger.debug(`${this.name}: Retry ${retryCount}, waiting ${delay}ms`);
        return delay;
      },
      retryCondition: isRetryable,
      onRetry: (retryCount, error) => {
        logger.warn(`${this.name}: Retrying request (${retryCount})`, {
          url: this.describe(error.config),
          status: error.response?.status,
        });
      },
    });

    this.client.interceptors.request.use((config) => {
      logger.debug(`${this.name}: ${config.method?.toUpperCase()} ${this.describe(config)}`);
      return config;
    });

    this.client.interceptors.response.use(
      (response) => {
        logger.debug(`${this.name}: Response ${response.status} from ${this.describe(response.config)}`);
        return response;
      },
      (error: AxiosError) => {
        const url = this.describe(error.config);
        if (error.response) {
          logger.error(`${this.name}: HTTP ${error.response.status}`, { url });
        } else if (error.request) {
          logger.error(`${this.name}: No response received`, { url, code: error.code });
        } else {
          logger.error(`${this.name}: Request setup error`, { message: error.message });
        }
        return Promise.reject(error);
      }
    );
  }

  // Response body of a GET
  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, config);
    return response.data;
  }

  // Raw response, for callers that judge the status themselves
  async request<T>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.client.request<T>(config);
  }

  describe(config: Pick<AxiosRequestConfig, 'baseURL' | 'url'> | undefined): string {
    const raw = `${config?.baseURL ?? ''}${config?.url ?? ''}`;
    if (!this.redactPaths) {
      return raw;
    }
    try {
      return `${new URL(raw).origin}/…`;
    } catch {
      return '[redacted]';
    }
  }
}

export default HttpClient;
