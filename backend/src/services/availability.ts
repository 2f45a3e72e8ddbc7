import type { Booking, CalendarDate } from '../models/structures';
import type { BookingRepository } from '../repositories/bookingRepository';

/**
 * Half-open overlap test for [startA, endA) and [startB, endB).
 * A range ending on day D does not overlap one starting on day D.
 */
export function intervalsOverlap(
  startA: CalendarDate,
  endA: CalendarDate,
  startB: CalendarDate,
  endB: CalendarDate
): boolean {
  return startA < endB && endA > startB;
}

// Pending and confirmed bookings hold the car; cancelled and completed ones never do.
export function isActiveBooking(booking: Pick<Booking, 'status'>): boolean {
  return booking.status === 'pending' || booking.status === 'confirmed';
}

/** True when no active booking of `carId` overlaps [startDate, endDate). */
export async function isCarAvailable(
  bookings: BookingRepository,
  carId: string,
  startDate: CalendarDate,
  endDate: CalendarDate
): Promise<boolean> {
  const existing = await bookings.findByCarAndDateRange(carId, startDate, endDate);
  return !existing.some(
    b => isActiveBooking(b) && intervalsOverlap(startDate, endDate, b.startDate, b.endDate)
  );
}
