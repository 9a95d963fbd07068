/**
 * Log configuration
 */

import { describe, it, expect } from 'vitest';
import { createRootLogger, resolveLogConfig, silentLogger } from '../utils/logger.js';

describe('resolveLogConfig', () => {
  it('should default to info and pretty', () => {
    expect(resolveLogConfig({}, {})).toEqual({ level: 'info', format: 'pretty' });
  });

  it('should keep the configured values without overrides', () => {
    expect(resolveLogConfig({ level: 'warn', format: 'json' }, {})).toEqual({ level: 'warn', format: 'json' });
  });

  it('should let the environment override the configured values', () => {
    const env = { RELAYWATCH_LOG: 'trace', RELAYWATCH_LOG_FORMAT: 'json' };
    expect(resolveLogConfig({ level: 'warn', format: 'pretty' }, env)).toEqual({ level: 'trace', format: 'json' });
  });

  it('should ignore unknown environment values', () => {
    const env = { RELAYWATCH_LOG: 'verbose', RELAYWATCH_LOG_FORMAT: 'xml' };
    expect(resolveLogConfig({ level: 'error' }, env)).toEqual({ level: 'error', format: 'pretty' });
  });
});

describe('createRootLogger', () => {
  it('should use the configured level', () => {
    const logger = createRootLogger({ level: 'warn', format: 'json' });
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});

describe('silentLogger', () => {
  it('should log nothing', () => {
    expect(silentLogger().level).toBe('silent');
  });
});
