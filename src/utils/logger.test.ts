import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { createServiceLogger } from './logger';

describe('createServiceLogger', () => {
  it('tags entries with the service and level', () => {
    const logger = createServiceLogger('UploadService', 'debug');

    expect(logger.level).toBe('debug');
    expect(logger.defaultMeta).toEqual({ service: 'UploadService' });
  });

  it('writes every level to stderr', () => {
    const [transport] = createServiceLogger('ProjectService').transports;

    expect(transport).toBeInstanceOf(winston.transports.Console);
    expect(transport).toHaveProperty('stderrLevels', { error: true, warn: true, info: true, debug: true });
  });
});
