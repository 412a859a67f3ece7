import { describe, it, expect } from 'vitest';
import { parseDueDate, formatDate, todayISO, addDays, daysBetween } from '../../src/parsers/date-parser.js';

describe('parseDueDate', () => {
  it('accepts exact yyyy-MM-dd dates', () => {
    expect(parseDueDate('2024-03-10')).toBe('2024-03-10');
    expect(parseDueDate('2024-02-29')).toBe('2024-02-29');
  });

  it('keeps two-digit years literal', () => {
    expect(parseDueDate('0099-01-01')).toBe('0099-01-01');
    expect(parseDueDate('0001-12-31')).toBe('0001-12-31');
    expect(addDays('0099-12-31', 1)).toBe('0100-01-01');
    expect(daysBetween('0099-01-01', '0099-01-11')).toBe(10);
  });

  it('rejects impossible dates', () => {
    expect(parseDueDate('2023-02-29')).toBeNull();
    expect(parseDueDate('2024-13-01')).toBeNull();
    expect(parseDueDate('2024-04-31')).toBeNull();
  });

  it('rejects other formats', () => {
    expect(parseDueDate('10.3.2024')).toBeNull();
    expect(parseDueDate('2024-3-10')).toBeNull();
    expect(parseDueDate(' 2024-03-10')).toBeNull();
    expect(parseDueDate('2024-03-10T00:00:00')).toBeNull();
    expect(parseDueDate('')).toBeNull();
    expect(parseDueDate(null)).toBeNull();
  });
});

describe('formatDate / todayISO', () => {
  it('formats the local calendar day', () => {
    expect(formatDate(new Date(2024, 2, 10, 23, 30))).toBe('2024-03-10');
    expect(todayISO(new Date(2025, 0, 5))).toBe('2025-01-05');
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2024-12-25', 7)).toBe('2025-01-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('throws on an invalid date', () => {
    expect(() => addDays('nope', 1)).toThrow(RangeError);
  });
});

describe('daysBetween', () => {
  it('is signed', () => {
    expect(daysBetween('2024-03-10', '2024-03-24')).toBe(14);
    expect(daysBetween('2024-03-24', '2024-03-10')).toBe(-14);
    expect(daysBetween('2024-03-10', '2024-03-10')).toBe(0);
  });
});
