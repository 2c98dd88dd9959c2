import { describe, it, expect } from 'vitest';
import { loadEnvironment, shouldLog } from '../config/environment';

describe('Environment configuration', () => {
  it('should fill defaults for unset variables', () => {
    const environment = loadEnvironment({});

    expect(environment.STORE_DRIVER).toBe('mongo');
    expect(environment.PORT).toBe(5000);
    expect(environment.TRANSACTION_MAX_RETRIES).toBe(3);
    expect(environment.LOG_LEVEL).toBe('info');
  });

  it('should coerce numeric variables', () => {
    const environment = loadEnvironment({ PORT: '8080', SLOW_OPERATION_MS: '250', STORE_DRIVER: 'memory' });

    expect(environment.PORT).toBe(8080);
    expect(environment.SLOW_OPERATION_MS).toBe(250);
    expect(environment.STORE_DRIVER).toBe('memory');
  });

  it('should name malformed variables', () => {
    expect(() => loadEnvironment({ STORE_DRIVER: 'postgres' })).toThrow(
      'Invalid environment configuration - STORE_DRIVER'
    );
    expect(() => loadEnvironment({ TRANSACTION_MAX_RETRIES: '-1' })).toThrow('TRANSACTION_MAX_RETRIES');
  });

  it('should rank log levels', () => {
    expect(shouldLog('warn', 'error')).toBe(true);
    expect(shouldLog('warn', 'info')).toBe(false);
    expect(shouldLog('silent', 'error')).toBe(false);
  });
});
