import { pino, type DestinationStream, type Logger, type LoggerOptions, type TransportTargetOptions } from 'pino';
import type { LogLevel } from '@lmstudio-compat-proxy/shared';

export interface LoggerConfig {
  level: LogLevel;
  /** Pretty console output (development) instead of JSON lines */
  pretty: boolean;
  /** Also append JSON lines to this file */
  logFile?: string;
}

/**
 * Development: pretty console, plus the log file when configured.
 * Otherwise: JSON lines on stdout, plus the log file when configured.
 */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: 'lmstudio-compat-proxy',
    level: config.level,
  };

  if (destination) {
    return pino(options, destination);
  }

  const targets: TransportTargetOptions[] = [];

  if (config.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } else if (config.logFile) {
    targets.push({ target: 'pino/file', level: config.level, options: { destination: 1 } });
  }

  if (config.logFile) {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: {
        destination: config.logFile,
        mkdir: true,
      },
    });
  }

  if (targets.length === 0) {
    return pino(options);
  }

  return pino({ ...options, transport: { targets } });
}

export type { Logger };
