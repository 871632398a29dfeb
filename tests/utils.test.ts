/**
 * Tests for utility functions
 */

import { describe, it, expect } from 'vitest';
import { Clock, Crypto, cleanText, errorCode, parseDate, truncate } from '../lib/utils';

describe('Crypto', () => {
  it('should generate distinct run ids', () => {
    const first = Crypto.uuid();
    const second = Crypto.uuid();
    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first).not.toBe(second);
  });
});

describe('Clock', () => {
  it('should add and subtract hours', () => {
    const base = new Date('2026-10-18T12:00:00.000Z');
    expect(Clock.addHours(base, -24).toISOString()).toBe('2026-10-17T12:00:00.000Z');
    expect(Clock.addHours(base, 2).toISOString()).toBe('2026-10-18T14:00:00.000Z');
  });

  it('should format file stamps from local time', () => {
    expect(Clock.toFileStamp(new Date(2026, 9, 18, 7, 5, 9))).toBe('20261018_070509');
  });
});

describe('truncate', () => {
  it('should keep short text unchanged', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('should keep a fixed-length prefix and append the suffix', () => {
    expect(truncate('abcdefghij', 4)).toBe('abcd...');
  });

  it('should return empty string for empty input', () => {
    expect(truncate('', 4)).toBe('');
  });
});

describe('cleanText', () => {
  it('should collapse whitespace', () => {
    expect(cleanText('  hello \n\n  world\t ')).toBe('hello world');
  });

  it('should treat missing values as empty', () => {
    expect(cleanText(undefined)).toBe('');
    expect(cleanText(null)).toBe('');
  });
});

describe('parseDate', () => {
  it('should parse ISO and RFC 822 dates', () => {
    expect(parseDate('2026-10-18T06:30:00Z')?.toISOString()).toBe('2026-10-18T06:30:00.000Z');
    expect(parseDate('Sun, 18 Oct 2026 06:30:00 GMT')?.toISOString()).toBe('2026-10-18T06:30:00.000Z');
  });

  it('should return undefined for garbage', () => {
    expect(parseDate('not a date')).toBeUndefined();
    expect(parseDate(undefined)).toBeUndefined();
  });
});

describe('errorCode', () => {
  it('should read string codes from errors', () => {
    const error = Object.assign(new Error('exists'), { code: 'EEXIST' });
    expect(errorCode(error)).toBe('EEXIST');
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('text')).toBeUndefined();
  });
});
