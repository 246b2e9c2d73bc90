import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  DEFAULT_LMSTUDIO_URL,
  DEFAULT_PORT,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  LOG_LEVELS,
  configSchema,
  type ConfigInput,
  type LogLevel,
  type ProxyConfig,
} from '@lmstudio-compat-proxy/shared';

export class ConfigError extends Error {
  constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
    super(
      `Invalid configuration: ${Object.entries(fieldErrors)
        .map(([field, errors]) => `${field} (${(errors ?? []).join(', ')})`)
        .join('; ')}`
    );
    this.name = 'ConfigError';
  }
}

export interface CliArgs {
  port?: number;
  lmstudioUrl?: string;
  bindAll?: boolean;
  cors?: boolean;
  logLevel?: string;
  upstreamTimeout?: number;
}

export function parseCliArgs(argv: string[] = hideBin(process.argv)): CliArgs {
  const args = yargs(argv)
    .scriptName('lmstudio-compat-proxy')
    .usage('$0 [options]\n\nA proxy to fix compatibility issues between OpenAI-style chat clients and LM Studio')
    .option('port', {
      alias: 'p',
      type: 'number',
      description: `Port to listen on (default ${DEFAULT_PORT})`,
    })
    .option('lmstudio-url', {
      alias: 'l',
      type: 'string',
      description: `LM Studio base URL (default ${DEFAULT_LMSTUDIO_URL})`,
    })
    .option('bind-all', {
      alias: 'b',
      type: 'boolean',
      description: 'Bind to all interfaces (0.0.0.0) instead of localhost only',
      // unset must stay undefined so the environment applies
      default: undefined,
    })
    .option('cors', {
      alias: 'c',
      type: 'boolean',
      description: 'Enable CORS (Cross-Origin Resource Sharing)',
      // unset must stay undefined so the environment applies
      default: undefined,
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      description: 'Log level (default info, debug in development)',
    })
    .option('upstream-timeout', {
      type: 'number',
      description: `Upstream headers/body timeout in ms, 0 disables (default ${DEFAULT_UPSTREAM_TIMEOUT_MS})`,
    })
    .strict()
    .help()
    .alias('help', 'h')
    .version(false)
    .parseSync();

  return {
    port: args.port,
    lmstudioUrl: args['lmstudio-url'],
    bindAll: args['bind-all'],
    cors: args.cors,
    logLevel: args['log-level'],
    upstreamTimeout: args['upstream-timeout'],
  };
}

/**
 * CLI flags override environment variables, which override defaults.
 */
export function loadConfig(cli: CliArgs = {}, env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const input: Record<keyof ConfigInput, unknown> = {
    port: cli.port ?? env.PORT,
    lmstudioUrl: cli.lmstudioUrl ?? env.LMSTUDIO_URL,
    bindAll: cli.bindAll ?? env.BIND_ALL,
    corsEnabled: cli.cors ?? env.CORS_ENABLED,
    logLevel: cli.logLevel ?? env.LOG_LEVEL,
    upstreamTimeoutMs: cli.upstreamTimeout ?? env.UPSTREAM_TIMEOUT_MS,
    logFile: env.LOG_FILE || undefined,
    nodeEnv: env.NODE_ENV,
  };

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

/** Reads `.env` into process.env, then merges it with argv */
export function loadConfigFromProcess(): ProxyConfig {
  dotenv.config();
  return loadConfig(parseCliArgs(), process.env);
}

export function resolveLogLevel(config: ProxyConfig): LogLevel {
  if (config.logLevel) return config.logLevel;
  return config.nodeEnv === 'development' ? 'debug' : 'info';
}
