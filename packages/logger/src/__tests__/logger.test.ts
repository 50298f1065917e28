import { describe, expect, it } from 'vitest';

import { loggerEnvSchema, validateLoggerEnv } from '../env.schema.js';
import { getLogger, getLoggerTransports, setLoggerTransports } from '../pino-logger.js';

describe('loggerEnvSchema', () => {
  it('applies defaults for an empty environment', () => {
    const config = validateLoggerEnv({});

    expect(config.LOGGER_LOG_LEVEL).toBe('info');
    expect(config.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(config.LOGGER_AUDIT_LOG_ENABLED).toBe(false);
    expect(config.LOGGER_SERVICE_NAME).toBe('netsettle');
    expect(config.NODE_ENV).toBe('development');
  });

  it('parses boolean flags from strings', () => {
    const config = validateLoggerEnv({ LOGGER_CONSOLE_ENABLED: 'true', LOGGER_FILE_LOG_ENABLED: 'yes' });

    expect(config.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(false);
  });

  it('rejects unknown log levels', () => {
    expect(loggerEnvSchema.safeParse({ LOGGER_LOG_LEVEL: 'verbose' }).success).toBe(false);
  });
});

describe('getLogger', () => {
  it('exposes standard and audit levels', () => {
    const logger = getLogger('test-category');

    expect(() => logger.info({ batchId: 'b-1' }, 'info message')).not.toThrow();
    expect(() => logger.audit({ batchId: 'b-1' }, 'audit message')).not.toThrow();
  });

  it('keeps working after transports are reconfigured', () => {
    const logger = getLogger('reconfigured');
    const before = getLoggerTransports();

    setLoggerTransports({ console: false });

    expect(getLoggerTransports().console).toBe(false);
    expect(() => logger.warn('still logging')).not.toThrow();

    setLoggerTransports(before);
  });
});
