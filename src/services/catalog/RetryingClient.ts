/**
 * Retrying Client
 *
 * The only place catalog requests are retried. Callers receive a FetchResult
 * and must not retry on their own.
 */

import { NetworkConfig } from '../../config/types.js';
import {
  MalformedResponseError,
  NETWORK_RETRY_POLICY,
  ProviderServerError,
  RateLimitError,
  ResourceNotFoundError,
  RetryStrategy,
  Sleeper,
  defaultSleeper,
} from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { CatalogTransport, TransportResponse } from './CatalogTransport.js';
import { RequestParams, ResponseCache } from './ResponseCache.js';

const PROVIDER_NAME = 'catalog';

export type FetchResult<T> =
  | { success: true; data: T; attempts: number; fromCache: boolean }
  | { success: false; error: Error; attempts: number };

export interface RetryingClientOptions {
  transport: CatalogTransport;
  network: NetworkConfig;
  imageBaseUrl: string;
  cache?: ResponseCache;
  sleep?: Sleeper;
}

/**
 * The catalog sometimes answers 200 with nothing in it
 */
export function isEmptyBody(body: unknown): boolean {
  if (body === null || body === undefined || body === '') {
    return true;
  }
  if (Buffer.isBuffer(body)) {
    return body.length === 0;
  }
  if (Array.isArray(body)) {
    return body.length === 0;
  }
  if (typeof body === 'object') {
    return Object.keys(body).length === 0;
  }
  return false;
}

export class RetryingClient {
  private readonly transport: CatalogTransport;
  private readonly cache: ResponseCache;
  private readonly retryStrategy: RetryStrategy;
  private readonly imageBaseUrl: string;

  constructor(options: RetryingClientOptions) {
    this.transport = options.transport;
    this.cache = options.cache ?? new ResponseCache();
    this.imageBaseUrl = options.imageBaseUrl.replace(/\/+$/, '');

    const delayMs = options.network.retryDelaySeconds * 1000;
    this.retryStrategy = new RetryStrategy(
      {
        ...NETWORK_RETRY_POLICY,
        maxAttempts: Math.max(1, options.network.maxRetries),
        initialDelayMs: delayMs,
        rateLimitDelayMs: delayMs,
        backoffMultiplier: options.network.backoffFactor,
        maxDelayMs: Number.MAX_SAFE_INTEGER,
      },
      options.sleep ?? defaultSleeper
    );
  }

  /**
   * Fetch a JSON endpoint, answering from the response cache when possible.
   * The body is unvalidated; CatalogService parses it.
   */
  async fetch(endpoint: string, params: RequestParams = {}): Promise<FetchResult<unknown>> {
    const signature = ResponseCache.signature(endpoint, params);
    const cached = this.cache.get(signature);
    if (cached !== undefined) {
      logger.debug('[RetryingClient] Response cache hit', { endpoint });
      return { success: true, data: cached, attempts: 0, fromCache: true };
    }

    const result = await this.retryStrategy.executeWithResult(async () => {
      const response = await this.transport.get(endpoint, params);
      return this.checkResponse(response, endpoint);
    }, `catalog ${endpoint}`);

    if (!result.success) {
      return { success: false, error: result.error, attempts: result.attemptCount };
    }

    this.cache.put(signature, result.value);
    return { success: true, data: result.value, attempts: result.attemptCount, fromCache: false };
  }

  /**
   * Download image bytes. Downloads are never cached.
   */
  async download(imagePath: string): Promise<FetchResult<Buffer>> {
    const url = this.imageUrl(imagePath);

    const result = await this.retryStrategy.executeWithResult(async () => {
      const response = await this.transport.getBinary(url);
      return this.checkResponse(response, url);
    }, `download ${imagePath}`);

    if (!result.success) {
      return { success: false, error: result.error, attempts: result.attemptCount };
    }
    return { success: true, data: result.value, attempts: result.attemptCount, fromCache: false };
  }

  imageUrl(imagePath: string): string {
    if (/^https?:\/\//.test(imagePath)) {
      return imagePath;
    }
    const cleanPath = imagePath.startsWith('/') ? imagePath.substring(1) : imagePath;
    return `${this.imageBaseUrl}/${cleanPath}`;
  }

  /**
   * Turn a transport response into its body, or throw the error the retry policy classifies
   */
  private checkResponse<T>(response: TransportResponse<T>, endpoint: string): T {
    const context = {
      service: 'RetryingClient',
      operation: 'fetch',
      metadata: { endpoint, status: response.status },
    };
    const { status } = response;

    if (status === 429) {
      throw new RateLimitError(PROVIDER_NAME, response.retryAfterSeconds, `Rate limited: ${endpoint}`, context);
    }

    if (status === 404) {
      throw new ResourceNotFoundError('catalog resource', endpoint, undefined, context);
    }

    if (status < 200 || status >= 300) {
      throw new ProviderServerError(PROVIDER_NAME, status, `Catalog error (${status}): ${endpoint}`, context);
    }

    if (isEmptyBody(response.body)) {
      throw new MalformedResponseError(PROVIDER_NAME, endpoint, undefined, context);
    }

    return response.body;
  }
}
