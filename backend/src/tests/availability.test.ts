import { intervalsOverlap, isActiveBooking, isCarAvailable } from '../services/availability';
import { InMemoryBookingRepository } from '../repositories/inMemoryRepositories';
import { CAR_1, CAR_2, makeBooking } from './__mocks__/cars.fixture';

describe('availability: intervalsOverlap', () => {
  test('ranges that only touch do not overlap', () => {
    expect(intervalsOverlap('2030-06-01', '2030-06-03', '2030-06-03', '2030-06-05')).toBe(false);
    expect(intervalsOverlap('2030-06-03', '2030-06-05', '2030-06-01', '2030-06-03')).toBe(false);
  });

  test('partial overlap, containment and identical ranges overlap', () => {
    expect(intervalsOverlap('2030-06-01', '2030-06-04', '2030-06-03', '2030-06-06')).toBe(true);
    expect(intervalsOverlap('2030-06-01', '2030-06-10', '2030-06-03', '2030-06-04')).toBe(true);
    expect(intervalsOverlap('2030-06-01', '2030-06-02', '2030-06-01', '2030-06-02')).toBe(true);
  });

  test('disjoint ranges do not overlap, across month and year boundaries too', () => {
    expect(intervalsOverlap('2030-06-01', '2030-06-02', '2030-06-05', '2030-06-06')).toBe(false);
    expect(intervalsOverlap('2030-12-30', '2031-01-02', '2031-01-01', '2031-01-03')).toBe(true);
    expect(intervalsOverlap('2030-09-28', '2030-10-01', '2030-10-01', '2030-10-04')).toBe(false);
  });

  test('is symmetric and false whenever one range ends before the other starts', () => {
    const days = ['2030-06-01', '2030-06-02', '2030-06-03', '2030-06-04', '2030-06-05'];
    const ranges: Array<[string, string]> = [];
    for (let i = 0; i < days.length; i++) {
      for (let j = i + 1; j < days.length; j++) ranges.push([days[i], days[j]]);
    }

    for (const [s1, e1] of ranges) {
      for (const [s2, e2] of ranges) {
        const forward = intervalsOverlap(s1, e1, s2, e2);
        expect(intervalsOverlap(s2, e2, s1, e1)).toBe(forward);
        if (e1 <= s2 || e2 <= s1) expect(forward).toBe(false);
      }
    }
  });
});

describe('availability: isActiveBooking', () => {
  test('only pending and confirmed bookings are active', () => {
    expect(isActiveBooking({ status: 'pending' })).toBe(true);
    expect(isActiveBooking({ status: 'confirmed' })).toBe(true);
    expect(isActiveBooking({ status: 'cancelled' })).toBe(false);
    expect(isActiveBooking({ status: 'completed' })).toBe(false);
  });
});

describe('availability: isCarAvailable', () => {
  test('free when the car has no bookings', async () => {
    const bookings = new InMemoryBookingRepository();
    await expect(isCarAvailable(bookings, CAR_1, '2030-06-02', '2030-06-04')).resolves.toBe(true);
  });

  test('pending and confirmed bookings block an overlapping range', async () => {
    const pending = new InMemoryBookingRepository([makeBooking(CAR_1, '2030-06-02', '2030-06-05', 'pending')]);
    const confirmed = new InMemoryBookingRepository([makeBooking(CAR_1, '2030-06-02', '2030-06-05', 'confirmed')]);

    await expect(isCarAvailable(pending, CAR_1, '2030-06-04', '2030-06-06')).resolves.toBe(false);
    await expect(isCarAvailable(confirmed, CAR_1, '2030-06-01', '2030-06-03')).resolves.toBe(false);
  });

  test('cancelled and completed bookings never block', async () => {
    const bookings = new InMemoryBookingRepository([
      makeBooking(CAR_1, '2030-06-02', '2030-06-05', 'cancelled'),
      makeBooking(CAR_1, '2030-06-02', '2030-06-05', 'completed')
    ]);
    await expect(isCarAvailable(bookings, CAR_1, '2030-06-02', '2030-06-05')).resolves.toBe(true);
  });

  test('bookings of another car or of an adjacent range do not block', async () => {
    const bookings = new InMemoryBookingRepository([
      makeBooking(CAR_2, '2030-06-02', '2030-06-05', 'confirmed'),
      makeBooking(CAR_1, '2030-06-05', '2030-06-07', 'confirmed')
    ]);
    await expect(isCarAvailable(bookings, CAR_1, '2030-06-02', '2030-06-05')).resolves.toBe(true);
  });
});
