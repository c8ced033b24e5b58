// src/services/base/types.ts
import type { Transport } from '../transport.service';
import type { RouteResolver } from '../routes';

export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
}

export interface ServiceConfig {
  logger: Logger;
  transport: Transport;
  routes: RouteResolver;
}
