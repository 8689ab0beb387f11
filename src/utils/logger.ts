/**
 * Application logger (pino)
 *
 * - development: pretty output on stdout + JSON lines in LOG_FILE
 * - production: JSON on stdout + JSON lines in LOG_FILE
 * - test: silent, no transports
 */

import pino, { type Logger, type TransportTargetOptions } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  const { level, file } = config.logging;

  if (config.app.env === 'test' || level === 'silent') {
    return pino({ level: 'silent' });
  }

  const targets: TransportTargetOptions[] = [
    config.app.env === 'development'
      ? {
          target: 'pino-pretty',
          level,
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' },
        }
      : { target: 'pino/file', level, options: { destination: 1 } },
    { target: 'pino/file', level, options: { destination: file, mkdir: true } },
  ];

  return pino(
    {
      level,
      base: { app: config.app.name },
      serializers: { error: pino.stdSerializers.err },
    },
    pino.transport({ targets })
  );
}

export const logger = createLogger();
