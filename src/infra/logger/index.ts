/**
 * Logger factory using Pino
 * Structured JSON logs; pino-pretty output for local development
 */

import pinoLib, { type Logger, type TransportSingleOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

export const SERVICE_NAME = 'url-shortener-server';

const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Creates the service logger. Fastify receives this same instance, so request
 * logs and store logs share one stream.
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const {
    level = 'info',
    name = SERVICE_NAME,
    pretty = process.env['NODE_ENV'] === 'development',
  } = config;

  return pinoLib({
    name,
    level,
    serializers: { err: pinoLib.stdSerializers.err },
    ...(pretty && { transport: PRETTY_TRANSPORT }),
  });
};

/**
 * Logger that discards everything (tests)
 */
export const createSilentLogger = (): Logger => pinoLib({ level: 'silent' });

export { type Logger } from 'pino';
