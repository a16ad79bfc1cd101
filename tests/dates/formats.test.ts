import { describe, it, expect } from 'vitest';
import {
  parseInternetDateTime,
  parseIsoLocal,
  parseMonthDayYearAtTime,
  parseMonthDayYearTime,
} from '../../src/dates/formats.js';

describe('parseMonthDayYearTime', () => {
  it('should parse afternoon times in local time', () => {
    expect(parseMonthDayYearTime('Nov 29, 2024 2:19:59 PM')).toEqual(new Date(2024, 10, 29, 14, 19, 59));
  });

  it('should map 12 AM to midnight and 12 PM to noon', () => {
    expect(parseMonthDayYearTime('Jan 1, 2024 12:05:00 AM')).toEqual(new Date(2024, 0, 1, 0, 5, 0));
    expect(parseMonthDayYearTime('Jan 1, 2024 12:05:00 PM')).toEqual(new Date(2024, 0, 1, 12, 5, 0));
  });

  it('should accept lowercase month and meridiem', () => {
    expect(parseMonthDayYearTime('nov 28, 2024 11:46:34 am')).toEqual(new Date(2024, 10, 28, 11, 46, 34));
  });

  it('should reject impossible values', () => {
    expect(parseMonthDayYearTime('Feb 30, 2024 1:00:00 AM')).toBeNull();
    expect(parseMonthDayYearTime('Nov 28, 2024 13:00:00 PM')).toBeNull();
    expect(parseMonthDayYearTime('Nov 28, 2024 0:00:00 AM')).toBeNull();
    expect(parseMonthDayYearTime('Foo 28, 2024 1:00:00 AM')).toBeNull();
  });

  it('should not accept the "at" form', () => {
    expect(parseMonthDayYearTime('Nov 28, 2024 at 11:46:34 AM')).toBeNull();
  });
});

describe('parseMonthDayYearAtTime', () => {
  it('should parse the "at" form', () => {
    expect(parseMonthDayYearAtTime('Nov 28, 2024 at 11:46:34 AM')).toEqual(new Date(2024, 10, 28, 11, 46, 34));
  });

  it('should require "at"', () => {
    expect(parseMonthDayYearAtTime('Nov 28, 2024 11:46:34 AM')).toBeNull();
  });
});

describe('parseIsoLocal', () => {
  it('should parse a space-separated date and time', () => {
    expect(parseIsoLocal('2023-12-25 14:30:45')).toEqual(new Date(2023, 11, 25, 14, 30, 45));
  });

  it('should take a T separator only when asked', () => {
    expect(parseIsoLocal('2023-12-25T14:30:45')).toBeNull();
    expect(parseIsoLocal('2023-12-25T14:30:45', 'T')).toEqual(new Date(2023, 11, 25, 14, 30, 45));
  });

  it('should reject out-of-range fields', () => {
    expect(parseIsoLocal('2023-13-01 00:00:00')).toBeNull();
    expect(parseIsoLocal('2023-12-25 24:00:00')).toBeNull();
    expect(parseIsoLocal('2023-02-29 10:00:00')).toBeNull();
  });
});

describe('parseInternetDateTime', () => {
  it('should parse UTC with fractional seconds', () => {
    expect(parseInternetDateTime('2024-11-28T11:46:34.250Z')?.toISOString()).toBe('2024-11-28T11:46:34.250Z');
  });

  it('should apply the zone offset', () => {
    expect(parseInternetDateTime('2024-11-28T11:46:34.5+02:00')?.toISOString()).toBe('2024-11-28T09:46:34.500Z');
  });

  it('should require fractional seconds and a zone', () => {
    expect(parseInternetDateTime('2024-11-28T11:46:34Z')).toBeNull();
    expect(parseInternetDateTime('2024-11-28T11:46:34.000')).toBeNull();
  });
});
