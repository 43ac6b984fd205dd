/**
 * Application logger
 *
 * Pretty, leveled console output plus a persistent log file.
 */

import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';
import { config } from '../config/index.js';

function buildLogger(): Logger {
  const { level, file, pretty } = config.logging;

  if (level === 'silent') {
    return pino({ level });
  }

  const targets: TransportTargetOptions[] = [
    pretty
      ? {
          target: 'pino-pretty',
          level,
          options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
        }
      : { target: 'pino/file', level, options: { destination: 1 } },
    {
      target: 'pino/file',
      level,
      options: { destination: file, mkdir: true },
    },
  ];

  return pino(
    {
      level,
      base: { app: config.app.name },
    },
    pino.transport({ targets })
  );
}

export const logger = buildLogger();

export type { Logger };
