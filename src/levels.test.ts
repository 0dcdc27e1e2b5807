import { describe, expect, it } from 'vitest';
import { levelName, parseLogLevel, resolveLevel } from './levels';
import { LogLevel } from './types';

describe('levelName', () => {
  it('maps every level to its fixed label', () => {
    expect(levelName(LogLevel.DEBUG)).toBe('debug');
    expect(levelName(LogLevel.INFO)).toBe('info');
    expect(levelName(LogLevel.WARNING)).toBe('warning');
    expect(levelName(LogLevel.ERROR)).toBe('error');
  });

  it('falls back to an empty label outside the enum', () => {
    const unknownLevel: number = 7;
    expect(levelName(unknownLevel)).toBe('');
  });
});

describe('parseLogLevel', () => {
  it('accepts names in any case with surrounding blanks', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('INFO')).toBe(LogLevel.INFO);
    expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARNING);
    expect(parseLogLevel('warn')).toBe(LogLevel.WARNING);
    expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
  });

  it('accepts numbers and clamps them to the known range', () => {
    expect(parseLogLevel('0')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('2')).toBe(LogLevel.WARNING);
    expect(parseLogLevel('1.9')).toBe(LogLevel.INFO);
    expect(parseLogLevel('7')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('-1')).toBe(LogLevel.DEBUG);
  });

  it('returns undefined for anything else', () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
    expect(parseLogLevel('   ')).toBeUndefined();
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('resolveLevel', () => {
  it('prefers an explicit level', () => {
    expect(resolveLevel({ level: LogLevel.ERROR, env: { LOG_LEVEL: 'debug', DEBUG_MODE: '1' } })).toBe(LogLevel.ERROR);
  });

  it('turns on debug with DEBUG_MODE before looking at LOG_LEVEL', () => {
    expect(resolveLevel({ env: { DEBUG_MODE: 'yes', LOG_LEVEL: 'error' } })).toBe(LogLevel.DEBUG);
    expect(resolveLevel({ env: { DEBUG_MODE: 'ON' } })).toBe(LogLevel.DEBUG);
  });

  it('ignores DEBUG_MODE values that are not truthy', () => {
    expect(resolveLevel({ env: { DEBUG_MODE: 'off', LOG_LEVEL: 'error' } })).toBe(LogLevel.ERROR);
  });

  it('reads LOG_LEVEL', () => {
    expect(resolveLevel({ env: { LOG_LEVEL: 'warning' } })).toBe(LogLevel.WARNING);
  });

  it('falls back to info', () => {
    expect(resolveLevel({ env: {} })).toBe(LogLevel.INFO);
    expect(resolveLevel({ env: { LOG_LEVEL: 'nonsense' } })).toBe(LogLevel.INFO);
  });
});
