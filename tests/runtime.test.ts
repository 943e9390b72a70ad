import { describe, test, expect } from '@jest/globals';
import { resolveRuntime } from '../src/config/runtime.js';
import { envFlag, envInt } from '../src/util/env.js';

describe('resolveRuntime', () => {
  test('defaults to info', () => {
    expect(resolveRuntime({}, false)).toEqual({ production: false, verbose: false, logLevel: 'info' });
  });
  test('verbose means debug, except in production', () => {
    expect(resolveRuntime({ LOAN_VERBOSE: 'true' }, false).logLevel).toBe('debug');
    expect(resolveRuntime({ LOAN_VERBOSE: 'true', LOAN_PRODUCTION: 'true' }, false))
      .toEqual({ production: true, verbose: false, logLevel: 'info' });
  });
  test('LOG_LEVEL wins, unknown levels are ignored', () => {
    expect(resolveRuntime({ LOG_LEVEL: 'WARN' }, true).logLevel).toBe('warn');
    expect(resolveRuntime({ LOG_LEVEL: 'loud' }, false).logLevel).toBe('info');
  });
  test('silent under tests unless asked', () => {
    expect(resolveRuntime({}, true).logLevel).toBe('silent');
  });
});

describe('env helpers', () => {
  test('envFlag', () => {
    expect(envFlag('X', { X: 'yes' })).toBe(true);
    expect(envFlag('X', { X: '1' })).toBe(true);
    expect(envFlag('X', { X: 'false' })).toBe(false);
    expect(envFlag('X', {})).toBe(false);
  });
  test('envInt', () => {
    expect(envInt('N', { N: '1_000' })).toBe(1000);
    expect(envInt('N', { N: '' })).toBeUndefined();
    expect(envInt('N', {})).toBeUndefined();
    expect(() => envInt('N', { N: '12.5' })).toThrow('N must be an integer, got "12.5"');
  });
});
