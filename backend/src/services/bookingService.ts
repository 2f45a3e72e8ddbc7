import { Booking, CalendarDate, Car, Result, err, ok } from '../models/structures';
import { NewBookingInput, newBooking } from '../models/entities';
import type { BookingRepository } from '../repositories/bookingRepository';
import type { CarRepository } from '../repositories/carRepository';
import { KeyedLock } from '../lib/keyedLock';
import { daysBetween } from '../lib/dates';
import { isCarAvailable } from './availability';

export type BookingServiceDeps = {
  cars: CarRepository;
  bookings: BookingRepository;
  now?: () => Date;
};

/**
 * Booking lifecycle: create, look up, cancel, and search cars free over a date range.
 *
 * Creation for one car is serialized so that the availability check and the
 * write of the new booking cannot interleave with another creation for the same car.
 */
export function createBookingService({ cars, bookings, now = () => new Date() }: BookingServiceDeps) {
  const perCar = new KeyedLock();

  // CREATE a pending booking; no write happens unless every check passes
  async function createBooking(input: NewBookingInput): Promise<Result<Booking>> {
    return perCar.run(input.carId, async () => {
      const car = await cars.findById(input.carId);
      if (!car) return err('CAR_NOT_FOUND', 'Car not found');

      const free = await isCarAvailable(bookings, input.carId, input.startDate, input.endDate);
      if (!free) return err('CAR_NOT_AVAILABLE', 'Car is not available for the selected dates');

      const totalCost = daysBetween(input.startDate, input.endDate) * car.dailyRate;
      const built = newBooking(input, totalCost, now());
      if (!built.ok) return built;

      return ok(await bookings.save(built.data));
    });
  }

  async function getBooking(id: string): Promise<Result<Booking>> {
    const booking = await bookings.findById(id);
    if (!booking) return err('BOOKING_NOT_FOUND', 'Booking not found');
    return ok(booking);
  }

  // Cancelling an already cancelled or completed booking is not an error
  async function cancelBooking(id: string): Promise<Result<Booking>> {
    const found = await getBooking(id);
    if (!found.ok) return found;

    const updated = await bookings.update({
      ...found.data,
      status: 'cancelled',
      updatedAt: now().toISOString(),
    });
    if (!updated) return err('BOOKING_NOT_FOUND', 'Booking not found');
    return ok(updated);
  }

  // Cars in "available" status with no active booking over the range, in storage order
  async function listAvailableCarsByDate(startDate: CalendarDate, endDate: CalendarDate): Promise<Car[]> {
    const all = await cars.findAll();
    const result: Car[] = [];
    for (const car of all) {
      if (car.status !== 'available') continue;
      if (await isCarAvailable(bookings, car.id, startDate, endDate)) result.push(car);
    }
    return result;
  }

  return {
    createBooking,
    getBooking,
    cancelBooking,
    listAvailableCarsByDate,
    isCarAvailable: (carId: string, startDate: CalendarDate, endDate: CalendarDate) =>
      isCarAvailable(bookings, carId, startDate, endDate),
  };
}

export type BookingService = ReturnType<typeof createBookingService>;
