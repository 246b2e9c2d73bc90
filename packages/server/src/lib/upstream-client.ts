/**
 * Outbound HTTP client for the LM Studio server
 *
 * One instance per process, shared read-only by every request:
 * - a single undici Agent (keep-alive connection pool)
 * - headers/body timeouts from configuration (0 disables)
 * - redirects are returned to the client, never followed
 * - response bodies stay streams; buffering is the caller's decision
 */

import { Agent, fetch, type Response } from 'undici';
import type { HeaderEntries } from '@lmstudio-compat-proxy/shared';
import type { Logger } from './logger.js';

export interface UpstreamClientOptions {
  baseUrl: string;
  /** Headers and body timeout (ms, 0 disables) */
  timeout: number;
  logger: Logger;
}

export interface UpstreamFetchOptions {
  method: string;
  headers: HeaderEntries;
  body?: Uint8Array;
  signal?: AbortSignal;
}

export type UpstreamResponse = Response;

export class UpstreamClient {
  private readonly agent: Agent;
  readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(options: UpstreamClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger;
    this.agent = new Agent({
      headersTimeout: options.timeout,
      bodyTimeout: options.timeout,
    });
  }

  /** `<base><path>[?<query>]` */
  buildUrl(path: string, query: string): string {
    const suffix = path.startsWith('/') ? path : `/${path}`;
    return query ? `${this.baseUrl}${suffix}?${query}` : `${this.baseUrl}${suffix}`;
  }

  async fetch(url: string, options: UpstreamFetchOptions): Promise<UpstreamResponse> {
    const method = options.method.toUpperCase();
    const hasBody = options.body !== undefined && options.body.length > 0;
    // fetch rejects a body on GET/HEAD
    const bodyless = method === 'GET' || method === 'HEAD';
    if (bodyless && hasBody) {
      this.logger.warn({ method, url }, 'Request body dropped, GET/HEAD requests are sent without one');
    }
    const body = bodyless || !hasBody ? undefined : options.body;

    return fetch(url, {
      method,
      headers: options.headers,
      body,
      redirect: 'manual',
      signal: options.signal,
      dispatcher: this.agent,
    });
  }

  async destroy(): Promise<void> {
    try {
      await this.agent.close();
    } catch (error) {
      this.logger.warn({ error }, 'Error closing upstream connection pool');
    }
  }
}
