/**
 * Catalog Transport
 *
 * The raw HTTP seam under RetryingClient. A transport reports status codes
 * instead of throwing for them; it throws only when no response arrived.
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { CatalogConfig, NetworkConfig } from '../../config/types.js';
import { ErrorCode, NetworkError, TimeoutError } from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { RequestParams } from './ResponseCache.js';

export interface TransportResponse<T> {
  status: number;
  /** Parsed Retry-After header, in seconds */
  retryAfterSeconds?: number;
  body: T;
}

export interface CatalogTransport {
  get(endpoint: string, params: RequestParams): Promise<TransportResponse<unknown>>;
  getBinary(url: string): Promise<TransportResponse<Buffer>>;
}

/**
 * Parse a Retry-After header given in seconds. HTTP dates are not honored.
 */
export function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export class AxiosCatalogTransport implements CatalogTransport {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly defaultParams: RequestParams;

  constructor(catalog: CatalogConfig, network: NetworkConfig) {
    this.timeoutMs = network.timeoutSeconds * 1000;

    this.defaultParams = {
      api_key: catalog.apiKey,
      language: catalog.language,
      region: catalog.region,
    };

    this.client = axios.create({
      baseURL: catalog.baseUrl,
      headers: {
        'Content-Type': 'application/json;charset=utf-8',
      },
      timeout: this.timeoutMs,
      // Status handling belongs to RetryingClient
      validateStatus: () => true,
    });
  }

  async get(endpoint: string, params: RequestParams): Promise<TransportResponse<unknown>> {
    try {
      const response = await this.client.get<unknown>(endpoint, {
        params: { ...this.defaultParams, ...params },
      });
      logger.debug('[CatalogTransport] Request complete', { endpoint, status: response.status });
      return this.toTransportResponse(response.status, response.headers['retry-after'], response.data);
    } catch (error) {
      throw this.convertTransportError(error, endpoint);
    }
  }

  async getBinary(url: string): Promise<TransportResponse<Buffer>> {
    try {
      // Image URLs are absolute and never carry the api key
      const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return this.toTransportResponse(
        response.status,
        response.headers['retry-after'],
        Buffer.from(response.data)
      );
    } catch (error) {
      throw this.convertTransportError(error, url);
    }
  }

  private toTransportResponse<T>(status: number, retryAfter: unknown, body: T): TransportResponse<T> {
    const retryAfterSeconds = parseRetryAfter(retryAfter);
    return {
      status,
      body,
      ...(retryAfterSeconds !== undefined && { retryAfterSeconds }),
    };
  }

  /**
   * Only transport-level failures reach here, since every status is accepted
   */
  private convertTransportError(error: unknown, endpoint: string): Error {
    const context = {
      service: 'AxiosCatalogTransport',
      operation: 'request',
      metadata: { endpoint },
    };

    if (error instanceof AxiosError) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError(this.timeoutMs, endpoint, `Catalog request timeout: ${endpoint}`, context);
      }
      return new NetworkError(
        `Catalog network error: ${error.message}`,
        ErrorCode.NETWORK_CONNECTION_FAILED,
        endpoint,
        { ...context, metadata: { ...context.metadata, code: error.code } },
        error
      );
    }

    return new NetworkError(
      `Catalog network error: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      endpoint,
      context,
      error instanceof Error ? error : undefined
    );
  }
}
