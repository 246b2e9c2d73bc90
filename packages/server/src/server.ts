#!/usr/bin/env node
import { ALL_INTERFACES_HOST, LOOPBACK_HOST, type ProxyConfig } from '@lmstudio-compat-proxy/shared';
import { ConfigError, loadConfigFromProcess, resolveLogLevel } from './config/config.js';
import { createLogger } from './lib/logger.js';
import { createContext } from './lib/context.js';
import { createApp } from './app.js';

function loadConfigOrExit(): ProxyConfig {
  try {
    return loadConfigFromProcess();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      console.error(error.fieldErrors);
      process.exit(1);
    }
    throw error;
  }
}

function main() {
  const config = loadConfigOrExit();

  const logger = createLogger({
    level: resolveLogLevel(config),
    pretty: config.nodeEnv === 'development',
    logFile: config.logFile,
  });
  const ctx = createContext(config, logger);
  const host = config.bindAll ? ALL_INTERFACES_HOST : LOOPBACK_HOST;

  logger.info('Starting LM Studio compatibility proxy');
  logger.info(`Proxying to: ${config.lmstudioUrl}`);
  if (config.corsEnabled) {
    logger.info('CORS: Enabled');
  }
  logger.info('Fixes:');
  logger.info("  1. Adds type: 'object' to tool parameters");
  logger.info('  2. Adds input_tokens_details / output_tokens_details to usage responses');

  const app = createApp(ctx);

  const server = app.listen(config.port, host, () => {
    logger.info(`Listening on: http://${host}:${config.port}`);
    logger.info('Proxy ready!');
  });

  server.on('error', (error) => {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);

    server.close(() => {
      logger.info('HTTP server closed');

      ctx.upstream
        .destroy()
        .then(() => {
          logger.info('Upstream client destroyed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'Failed to destroy upstream client');
          process.exit(1);
        });
    });

    // Open streams would keep close() waiting; force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main();
