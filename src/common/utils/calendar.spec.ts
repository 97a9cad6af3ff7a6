import {
  dayOfYear,
  daysInMonth,
  fromDayOfYear,
  isLeapYear,
  parseCompactDate,
} from './calendar';

describe('calendar', () => {
  describe('isLeapYear', () => {
    it('should follow the Gregorian century rule', () => {
      expect(isLeapYear(2000)).toBe(true);
      expect(isLeapYear(1900)).toBe(false);
      expect(isLeapYear(2024)).toBe(true);
      expect(isLeapYear(2023)).toBe(false);
    });
  });

  describe('daysInMonth', () => {
    it('should give February 29 days only in leap years', () => {
      expect(daysInMonth(2020, 2)).toBe(29);
      expect(daysInMonth(1970, 2)).toBe(28);
      expect(daysInMonth(1970, 4)).toBe(30);
      expect(daysInMonth(1970, 12)).toBe(31);
    });
  });

  describe('parseCompactDate', () => {
    it('should parse a real date', () => {
      expect(parseCompactDate('19820927')).toEqual({
        year: 1982,
        month: 9,
        day: 27,
      });
    });

    it('should reject February 29 outside leap years', () => {
      expect(parseCompactDate('19700229')).toBeUndefined();
      expect(parseCompactDate('20200229')).toEqual({
        year: 2020,
        month: 2,
        day: 29,
      });
    });

    it('should reject out-of-range months and days', () => {
      expect(parseCompactDate('19821301')).toBeUndefined();
      expect(parseCompactDate('19820001')).toBeUndefined();
      expect(parseCompactDate('19820132')).toBeUndefined();
      expect(parseCompactDate('19820431')).toBeUndefined();
      expect(parseCompactDate('19820400')).toBeUndefined();
    });

    it('should reject anything that is not eight digits', () => {
      expect(parseCompactDate('1982092')).toBeUndefined();
      expect(parseCompactDate('198209270')).toBeUndefined();
      expect(parseCompactDate('1982-9-7')).toBeUndefined();
      expect(parseCompactDate('')).toBeUndefined();
    });
  });

  describe('dayOfYear / fromDayOfYear', () => {
    it('should convert between ordinal days and calendar dates', () => {
      expect(dayOfYear({ year: 2023, month: 3, day: 1 })).toBe(60);
      expect(dayOfYear({ year: 2024, month: 3, day: 1 })).toBe(61);
      expect(fromDayOfYear(2024, 366)).toEqual({
        year: 2024,
        month: 12,
        day: 31,
      });
      expect(fromDayOfYear(2023, 60)).toEqual({ year: 2023, month: 3, day: 1 });
    });

    it('should throw for ordinals outside the year', () => {
      expect(() => fromDayOfYear(2023, 366)).toThrow(RangeError);
      expect(() => fromDayOfYear(2023, 0)).toThrow(RangeError);
    });
  });
});
