/**
 * Proxy service
 *
 * Per request:
 * 1. Inbound body is already buffered by the body reader
 * 2. JSON bodies get their tool parameter schemas completed (fail open)
 * 3. One upstream call to `<lmstudio-url><path>[?<query>]`, no retries
 * 4. Upstream `text/event-stream` → forwarded event by event with usage completion
 *    anything else → buffered, JSON usage completed (fail open)
 * 5. Length/encoding headers dropped, everything else passed through
 */

import type { Response } from 'express';
import {
  CONTENT_TYPE,
  ErrorCodes,
  type ErrorCode,
  type HeaderEntries,
  type ProxyRequest,
} from '@lmstudio-compat-proxy/shared';
import type { AppContext } from '../../lib/context.js';
import type { Logger } from '../../lib/logger.js';
import type { UpstreamResponse } from '../../lib/upstream-client.js';
import { AppError } from '../../middlewares/error.middleware.js';
import {
  fromFetchHeaders,
  getHeader,
  sanitizeRequestHeaders,
  sanitizeResponseHeaders,
  toOutgoingHeaders,
} from './headers.js';
import { patchRequestBody, patchResponseBody } from './transform/json-body.js';
import { SseEventBuffer } from './transform/sse-filter.js';

export class ProxyService {
  constructor(private readonly ctx: AppContext) {}

  async proxyRequest(request: ProxyRequest, res: Response, logger: Logger = this.ctx.logger): Promise<void> {
    const { upstream } = this.ctx;
    logger.info(`${request.method} ${request.path}${request.query ? `?${request.query}` : ''}`);

    const body = this.prepareRequestBody(request, logger);
    const url = upstream.buildUrl(request.path, request.query);

    // Client gone → stop pulling from upstream and release the connection
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) abort.abort();
    });

    let response: UpstreamResponse;
    try {
      response = await upstream.fetch(url, {
        method: request.method,
        headers: sanitizeRequestHeaders(request.headers),
        body,
        signal: abort.signal,
      });
    } catch (error) {
      if (abort.signal.aborted) {
        logger.debug({ url }, 'Client disconnected before upstream responded');
        return;
      }
      logger.error({ error: describeError(error), url }, 'Failed to proxy request');
      throw new ProxyError(502, ErrorCodes.UPSTREAM_UNREACHABLE, `Failed to reach upstream: ${describeError(error)}`);
    }

    logger.info(`Response: ${response.status}`);

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes(CONTENT_TYPE.EVENT_STREAM)) {
      await this.forwardStream(response, res, abort, logger);
    } else {
      await this.forwardBuffered(response, res, contentType, abort, logger);
    }
  }

  /**
   * Only non-empty bodies declared as JSON are touched. A body that does not
   * parse is forwarded as received.
   */
  private prepareRequestBody(request: ProxyRequest, logger: Logger): Buffer {
    const contentType = getHeader(request.headers, 'content-type') ?? '';
    if (request.body.length === 0 || !contentType.includes(CONTENT_TYPE.JSON)) {
      return request.body;
    }

    const result = patchRequestBody(request.body);
    if (!result.ok) {
      logger.warn({ reason: result.error.message }, 'Could not fix request body');
      return request.body;
    }

    if (result.fixedTools > 0) {
      logger.info(`Fixed ${result.fixedTools} tool parameter schema(s)`);
    }
    return result.body;
  }

  private async forwardBuffered(
    response: UpstreamResponse,
    res: Response,
    contentType: string,
    abort: AbortController,
    logger: Logger
  ): Promise<void> {
    let body: Buffer;
    try {
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (abort.signal.aborted) {
        logger.debug('Client disconnected before upstream body was read');
        return;
      }
      logger.error({ error: describeError(error) }, 'Failed to read response body');
      throw new ProxyError(
        502,
        ErrorCodes.UPSTREAM_BODY_READ_ERROR,
        `Failed to read upstream response: ${describeError(error)}`
      );
    }

    if (contentType.includes(CONTENT_TYPE.JSON) && body.length > 0) {
      const result = patchResponseBody(body);
      if (!result.ok) {
        logger.warn({ reason: result.error.message }, 'Could not fix response body');
      } else {
        if (result.changed) logger.info('Fixed usage details in response');
        body = result.body;
      }
    }

    writeHead(res, response.status, fromFetchHeaders(response.headers));
    res.end(body);
  }

  /**
   * Headers go out immediately; events follow as soon as each one is complete.
   * Upstream read errors terminate the client stream, filter errors only
   * cost the patch for that event.
   */
  private async forwardStream(
    response: UpstreamResponse,
    res: Response,
    abort: AbortController,
    logger: Logger
  ): Promise<void> {
    writeHead(res, response.status, fromFetchHeaders(response.headers));
    res.flushHeaders();

    if (!response.body) {
      res.end();
      return;
    }

    const events = new SseEventBuffer({
      onFilterError: (error) => logger.debug({ error: describeError(error) }, 'SSE filter failed, event forwarded as is'),
    });
    const reader = response.body.getReader();

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        const ready = events.push(value);
        if (ready.length > 0 && !res.write(ready)) {
          await waitForDrain(res);
        }

        if (res.destroyed) {
          abort.abort();
          logger.debug('Client disconnected mid-stream');
          return;
        }
      }

      const rest = events.flush();
      if (rest.length > 0) res.write(rest);
      res.end();
    } catch (error) {
      if (abort.signal.aborted) {
        logger.debug('Client disconnected mid-stream');
        return;
      }
      logger.error({ error: describeError(error) }, 'Upstream stream failed');
      res.destroy(error instanceof Error ? error : new Error(String(error)));
    } finally {
      reader.releaseLock();
    }
  }
}

function writeHead(res: Response, status: number, headers: HeaderEntries): void {
  res.status(status);
  for (const [name, value] of toOutgoingHeaders(sanitizeResponseHeaders(headers))) {
    res.setHeader(name, value);
  }
}

function waitForDrain(res: Response): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.once('drain', done);
    res.once('close', done);
  });
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici wraps socket errors: "fetch failed" ← cause
  return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
}

export class ProxyError extends AppError {
  constructor(statusCode: number, code: ErrorCode, message: string) {
    super(statusCode, code, message);
    this.name = 'ProxyError';
  }
}
