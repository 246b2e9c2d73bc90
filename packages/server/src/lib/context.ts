import type { ProxyConfig } from '@lmstudio-compat-proxy/shared';
import type { Logger } from './logger.js';
import { UpstreamClient } from './upstream-client.js';

/**
 * Everything a request handler shares with every other request. Built once
 * at startup and never mutated afterwards.
 */
export interface AppContext {
  readonly config: ProxyConfig;
  readonly logger: Logger;
  readonly upstream: UpstreamClient;
}

export function createContext(config: ProxyConfig, logger: Logger): AppContext {
  const upstream = new UpstreamClient({
    baseUrl: config.lmstudioUrl,
    timeout: config.upstreamTimeoutMs,
    logger,
  });
  return { config, logger, upstream };
}
