import { afterEach, describe, expect, it } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { getLogger, resetLoggers } from '../pino-logger.js';

describe('validateLoggerEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const config = validateLoggerEnv({});

    expect(config.LOGGER_LOG_LEVEL).toBe('info');
    expect(config.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(config.LOGGER_SERVICE_NAME).toBe('coinreckon');
    expect(config.NODE_ENV).toBe('development');
  });

  it('should parse boolean flags from strings', () => {
    const config = validateLoggerEnv({ LOGGER_CONSOLE_ENABLED: 'false', LOGGER_FILE_LOG_ENABLED: 'true' });

    expect(config.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('should reject unknown log levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose' })).toThrow();
  });
});

describe('getLogger', () => {
  afterEach(() => {
    resetLoggers();
  });

  it('should expose the configured level through the category proxy', () => {
    const logger = getLogger('TaxationEngine');

    expect(logger.level).toBe('info');
  });

  it('should bind child bindings for the category', () => {
    const logger = getLogger('LotQueue');

    expect(logger.bindings()).toMatchObject({ category: 'LotQueue' });
  });

  it('should not throw when logging in test mode', () => {
    const logger = getLogger('test');

    expect(() => logger.warn({ coin: 'BTC' }, 'missing price')).not.toThrow();
  });
});
