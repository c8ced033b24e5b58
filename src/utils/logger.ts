// src/utils/logger.ts
import winston from 'winston';
import { LogLevel } from '../config';

export const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a JSON console logger tagged with the owning service. Every level
 * goes to stderr; stdout belongs to the caller (the CLI prints results there).
 */
export function createServiceLogger(service: string, level: LogLevel = 'warn'): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    defaultMeta: { service },
    transports: [new winston.transports.Console({ stderrLevels: LOG_LEVELS })],
  });
}
