/**
 * Application logger based on pino.
 * This provides structured, JSON logs suitable for production.
 */
import pino, { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export interface AppLogger extends PinoLogger {}

/**
 * The one capability the reply layer needs: writing a diagnostic record.
 * Injected so tests can capture records instead of writing to stdout.
 */
export type DiagnosticLogger = Pick<PinoLogger, 'error'>;

export const logger: AppLogger = pino({
  level: config.logLevel,
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    env: config.env,
  },
  transport:
    config.env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
