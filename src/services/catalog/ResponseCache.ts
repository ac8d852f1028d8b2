/**
 * In-memory cache of successful catalog responses for the life of one run.
 *
 * Keyed by a signature of the endpoint and its query parameters so that
 * parameter order never produces two entries for the same request.
 */

import crypto from 'crypto';

export type RequestParams = Record<string, string | number | boolean | null | undefined>;

export class ResponseCache<T = unknown> {
  private readonly entries = new Map<string, T>();

  /**
   * Stable SHA-256 signature of a request.
   * Keys are sorted and undefined values dropped before hashing.
   */
  static signature(endpoint: string, params: RequestParams = {}): string {
    const normalized: Record<string, string | number | boolean | null> = {};
    for (const key of Object.keys(params).sort()) {
      const value = params[key];
      if (value !== undefined) {
        normalized[key] = value;
      }
    }

    return crypto
      .createHash('sha256')
      .update(endpoint)
      .update(JSON.stringify(normalized))
      .digest('hex');
  }

  get(signature: string): T | undefined {
    return this.entries.get(signature);
  }

  has(signature: string): boolean {
    return this.entries.has(signature);
  }

  /**
   * Callers only store successful responses
   */
  put(signature: string, response: T): void {
    this.entries.set(signature, response);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
