import type { Request, Response } from 'express';
import type { ProxyRequest } from '@lmstudio-compat-proxy/shared';
import { fromRawHeaders } from './headers.js';
import type { ProxyService } from './proxy.service.js';

export class ProxyController {
  constructor(private readonly proxyService: ProxyService) {}

  async handleProxy(req: Request, res: Response): Promise<void> {
    await this.proxyService.proxyRequest(toProxyRequest(req), res, req.log);
  }
}

/**
 * Path and query are taken from the raw request target so they reach the
 * upstream exactly as the client sent them.
 */
export function toProxyRequest(req: Request): ProxyRequest {
  const target = req.originalUrl;
  const queryStart = target.indexOf('?');

  return {
    method: req.method,
    path: queryStart === -1 ? target : target.slice(0, queryStart),
    query: queryStart === -1 ? '' : target.slice(queryStart + 1),
    headers: fromRawHeaders(req.rawHeaders),
    body: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
  };
}
