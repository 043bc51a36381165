import {
  isoWeekOf,
  parseSessionStart,
  toCalendarDate,
} from './session-date.util';

describe('session-date.util', () => {
  describe('parseSessionStart', () => {
    it('reads day-first exports', () => {
      const parsed = parseSessionStart('01/10/2020 09:00:00 AM');
      expect(parsed).not.toBeNull();
      expect(toCalendarDate(parsed!)).toBe('2020-10-01');
      expect(parsed!.getHours()).toBe(9);
    });

    it('reads the hour on the 24-hour clock and ignores AM/PM', () => {
      const afternoon = parseSessionStart('01/10/2020 13:05:00 PM');
      expect(afternoon).not.toBeNull();
      expect(toCalendarDate(afternoon!)).toBe('2020-10-01');
      expect(afternoon!.getHours()).toBe(13);
      expect(afternoon!.getMinutes()).toBe(5);

      expect(parseSessionStart('01/10/2020 02:15:00 PM')!.getHours()).toBe(2);
    });

    it('applies AM/PM under a 12-hour pattern and stays strict', () => {
      const twelveHour = 'd/M/yyyy h:mm:ss a';
      expect(
        parseSessionStart('01/10/2020 02:15:00 PM', twelveHour)!.getHours(),
      ).toBe(14);
      expect(parseSessionStart('01/10/2020 13:05:00 PM', twelveHour)).toBeNull();
    });

    it('accepts surrounding whitespace', () => {
      expect(toCalendarDate(parseSessionStart(' 05/10/2020 09:00:00 AM ')!)).toBe(
        '2020-10-05',
      );
    });

    it.each(['', 'yesterday', '32/10/2020 09:00:00 AM', '01/10/2020'])(
      'returns null for "%s"',
      (text) => {
        expect(parseSessionStart(text)).toBeNull();
      },
    );

    it('honours a custom pattern', () => {
      const parsed = parseSessionStart('2020-10-01 17:30', 'yyyy-MM-dd HH:mm');
      expect(toCalendarDate(parsed!)).toBe('2020-10-01');
    });
  });

  describe('isoWeekOf', () => {
    it('gives the week and its Monday', () => {
      expect(isoWeekOf('2020-10-07')).toEqual({
        isoYear: 2020,
        week: 41,
        weekStart: '2020-10-05',
      });
    });

    it('uses the ISO year across the new year', () => {
      expect(isoWeekOf('2019-12-31')).toEqual({
        isoYear: 2020,
        week: 1,
        weekStart: '2019-12-30',
      });
    });

    it('rejects text that is not a calendar date', () => {
      expect(() => isoWeekOf('05/10/2020')).toThrow(RangeError);
    });
  });
});
