// src/services/base/BaseService.ts
import { ServiceConfig, Logger } from './types';
import type { Transport } from '../transport.service';
import type { RouteResolver } from '../routes';

export abstract class BaseService {
  protected logger: Logger;
  protected transport: Transport;
  protected routes: RouteResolver;

  constructor(config: ServiceConfig) {
    this.logger = config.logger;
    this.transport = config.transport;
    this.routes = config.routes;
  }
}
