import { describe, expect, it } from 'vitest';

import { ParseError } from '../../errors/index.js';
import { assertErr, assertOk } from '../../__tests__/test-utils.js';
import { parseCalendarDate } from '../date-utils.js';

describe('parseCalendarDate', () => {
  it.each([
    ['2020-01-02', '2020-01-02'],
    ['2020-1-2', '2020-01-02'],
    ['2020/01/02', '2020-01-02'],
    ['01/02/2020', '2020-01-02'],
    ['1/2/2020', '2020-01-02'],
    ['1/2/20', '2020-01-02'],
    ['01-02-2020', '2020-01-02'],
    ['20200102', '2020-01-02'],
    ['Jan 2, 2020', '2020-01-02'],
    ['Jan. 2, 2020', '2020-01-02'],
    ['January 2, 2020', '2020-01-02'],
    ['2 Jan 2020', '2020-01-02'],
    ['02-Jan-2020', '2020-01-02'],
    ['02-Jan-20', '2020-01-02'],
    ['2020.01.02', '2020-01-02'],
    ['Sept 5, 2020', '2020-09-05'],
    ['Thursday, January 2, 2020', '2020-01-02'],
    ['  2020-01-02  ', '2020-01-02'],
  ])('should parse %s', (input, expected) => {
    expect(assertOk(parseCalendarDate(input))).toBe(expected);
  });

  it('should drop the time of day from datetimes', () => {
    expect(assertOk(parseCalendarDate('2020-01-02T23:59:00Z'))).toBe('2020-01-02');
    expect(assertOk(parseCalendarDate('2020-01-02 10:30'))).toBe('2020-01-02');
  });

  it.each([
    ['01/02/2020 10:30:00', '2020-01-02'],
    ['2020-01-02 10:00:00 UTC', '2020-01-02'],
    ['2020-01-02T10:00:00+05:00', '2020-01-02'],
    ['2020-01-02T10:00:00.123Z', '2020-01-02'],
    ['1/2/2020 3:45 PM', '2020-01-02'],
    ['Thu, 02 Jan 2020 10:00:00 GMT', '2020-01-02'],
  ])('should keep the calendar date of %s', (input, expected) => {
    expect(assertOk(parseCalendarDate(input))).toBe(expected);
  });

  it('should reject an impossible date that carries a time of day', () => {
    expect(parseCalendarDate('2020-02-30T10:00:00Z').isErr()).toBe(true);
  });

  it('should resolve two-digit years into 1950-2049', () => {
    expect(assertOk(parseCalendarDate('3/4/99'))).toBe('1999-03-04');
    expect(assertOk(parseCalendarDate('3/4/49'))).toBe('2049-03-04');
  });

  it('should reject impossible calendar dates', () => {
    const error = assertErr(parseCalendarDate('2020-02-30'));

    expect(error).toBeInstanceOf(ParseError);
    expect(error.literal).toBe('2020-02-30');
  });

  it('should reject unrecognized formats with the literal in the message', () => {
    const error = assertErr(parseCalendarDate('yesterday'));

    expect(error.message).toBe('Invalid date: "yesterday"');
  });

  it('should reject empty input', () => {
    expect(parseCalendarDate('').isErr()).toBe(true);
  });
});
