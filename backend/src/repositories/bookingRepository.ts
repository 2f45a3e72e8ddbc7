import type { Booking, CalendarDate } from '../models/structures';

// Booking Store
export interface BookingRepository {
  save(booking: Booking): Promise<Booking>;
  findById(id: string): Promise<Booking | undefined>;
  findAll(): Promise<Booking[]>;
  /**
   * Bookings of `carId` whose [startDate, endDate) intersects the queried
   * [startDate, endDate), in any status.
   */
  findByCarAndDateRange(carId: string, startDate: CalendarDate, endDate: CalendarDate): Promise<Booking[]>;
  update(booking: Booking): Promise<Booking | undefined>;
  delete(id: string): Promise<boolean>;
}
