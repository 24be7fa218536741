import { describe, expect, it } from 'vitest';
import { assertTimeZone, buildThreadName, formatMonthDay, truncateName } from './thread-name.js';

describe('buildThreadName', () => {
  it('uses the post date plus ten days in Tokyo time', () => {
    // 2024-01-01T00:00 in Tokyo.
    const createdAt = new Date('2024-01-01T00:00:00+09:00');
    expect(buildThreadName('Alice', createdAt)).toBe('Alice/1/11');
  });

  it('rolls the date over in the reference zone, not UTC', () => {
    // 2024-08-10T16:00Z is already 2024-08-11 in Tokyo.
    const createdAt = new Date('2024-08-10T16:00:00Z');
    expect(buildThreadName('Bob', createdAt)).toBe('Bob/8/21');
    expect(buildThreadName('Bob', createdAt, 'UTC')).toBe('Bob/8/20');
  });

  it('crosses month and leap-day boundaries', () => {
    expect(buildThreadName('C', new Date('2024-02-20T12:00:00+09:00'))).toBe('C/3/1');
    expect(buildThreadName('C', new Date('2023-02-20T12:00:00+09:00'))).toBe('C/3/2');
  });

  it('truncates long names to exactly 95 characters', () => {
    const name = buildThreadName('x'.repeat(120), new Date('2024-01-01T00:00:00+09:00'));
    expect(name).toHaveLength(95);
    expect(name).toBe('x'.repeat(95));
  });
});

describe('truncateName', () => {
  it('leaves short names untouched', () => {
    expect(truncateName('Alice/1/11')).toBe('Alice/1/11');
  });

  it('does not split a surrogate pair at the boundary', () => {
    const name = 'a'.repeat(94) + '\u{1F600}' + 'tail';
    const out = truncateName(name);
    expect(Array.from(out)).toHaveLength(95);
    expect(out.endsWith('\u{1F600}')).toBe(true);
  });
});

describe('formatMonthDay', () => {
  it('renders without zero padding', () => {
    expect(formatMonthDay(new Date('2024-03-05T00:00:00Z'), 'UTC')).toBe('3/5');
  });
});

describe('assertTimeZone', () => {
  it('accepts IANA zones and rejects unknown ones', () => {
    expect(() => assertTimeZone('Asia/Tokyo')).not.toThrow();
    expect(() => assertTimeZone('Mars/Olympus')).toThrow(RangeError);
  });
});
