import { addDays, daysBetween, toCalendarDate } from '../lib/dates';

describe('dates: toCalendarDate', () => {
  test('takes the UTC calendar day of an instant', () => {
    expect(toCalendarDate(new Date('2030-06-01T00:00:00.000Z'))).toBe('2030-06-01');
    expect(toCalendarDate(new Date('2030-06-01T23:59:59.999Z'))).toBe('2030-06-01');
  });

  test('is not shifted by an offset in the input', () => {
    expect(toCalendarDate(new Date('2030-06-01T23:30:00-02:00'))).toBe('2030-06-02');
  });
});

describe('dates: daysBetween', () => {
  test('counts whole days from start to end', () => {
    expect(daysBetween('2030-06-02', '2030-06-04')).toBe(2);
    expect(daysBetween('2030-06-02', '2030-06-03')).toBe(1);
    expect(daysBetween('2030-06-02', '2030-06-02')).toBe(0);
  });

  test('crosses month, leap-day and year boundaries', () => {
    expect(daysBetween('2030-01-30', '2030-02-02')).toBe(3);
    expect(daysBetween('2028-02-28', '2028-03-01')).toBe(2);
    expect(daysBetween('2030-12-31', '2031-01-01')).toBe(1);
  });

  test('is negative when end comes first', () => {
    expect(daysBetween('2030-06-04', '2030-06-02')).toBe(-2);
  });
});

describe('dates: addDays', () => {
  test('moves forward and back across boundaries', () => {
    expect(addDays('2030-06-01', 3)).toBe('2030-06-04');
    expect(addDays('2030-12-31', 1)).toBe('2031-01-01');
    expect(addDays('2030-03-01', -1)).toBe('2030-02-28');
    expect(addDays('2028-03-01', -1)).toBe('2028-02-29');
  });
});
