import { z } from 'zod';
import { DEFAULT_LMSTUDIO_URL, DEFAULT_PORT, DEFAULT_UPSTREAM_TIMEOUT_MS } from '../constants/api.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const NODE_ENVS = ['development', 'production', 'test'] as const;

// Env vars arrive as strings; CLI flags arrive already typed
const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : ['true', '1', 'yes'].includes(v.trim().toLowerCase())));

export const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  lmstudioUrl: z
    .string()
    .url()
    .default(DEFAULT_LMSTUDIO_URL)
    .transform((v) => v.replace(/\/+$/, '')),
  bindAll: booleanish.default(false),
  corsEnabled: booleanish.default(false),
  logLevel: z.enum(LOG_LEVELS).optional(),
  upstreamTimeoutMs: z.coerce.number().int().min(0).default(DEFAULT_UPSTREAM_TIMEOUT_MS),
  logFile: z.string().min(1).optional(),
  nodeEnv: z.enum(NODE_ENVS).default('production'),
});

export type ConfigInput = z.input<typeof configSchema>;
export type ProxyConfig = z.infer<typeof configSchema>;
