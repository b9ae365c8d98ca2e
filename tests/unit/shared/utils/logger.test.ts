import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { setupLogger } from '@shared/utils/logger';

describe('Logger Configuration', () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env.LOG_LEVEL;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.LOG_LEVEL = originalEnv;
    } else {
      delete process.env.LOG_LEVEL;
    }
  });

  it('should create a logger with default name and level', () => {
    delete process.env.LOG_LEVEL;
    const logger = setupLogger();

    expect(logger.bindings().name).toBe('dh-cost');
    expect(logger.level).toBe('info');
  });

  it('should create a logger with custom name', () => {
    expect(setupLogger('dh-cost:report').bindings().name).toBe('dh-cost:report');
  });

  it('should respect explicit log level parameter', () => {
    process.env.LOG_LEVEL = 'error';

    expect(setupLogger('test', 'debug').level).toBe('debug');
  });

  it('should read log level from LOG_LEVEL environment variable', () => {
    process.env.LOG_LEVEL = 'DEBUG';

    expect(setupLogger('env-test').level).toBe('debug');
  });

  it('should handle lowercase LOG_LEVEL environment variable', () => {
    process.env.LOG_LEVEL = 'warn';

    expect(setupLogger('env-test').level).toBe('warn');
  });

  it('should default to info level for unsupported values', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(setupLogger('env-test').level).toBe('info');
    expect(setupLogger('param-test', 'trace').level).toBe('info');
  });

  it('should suppress levels below the configured one', () => {
    const logger = setupLogger('filter-test', 'warn');

    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });
});
