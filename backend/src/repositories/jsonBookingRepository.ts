import type { Booking, CalendarDate } from '../models/structures';
import { bookingSchema } from '../models/schemas';
import { intervalsOverlap } from '../services/availability';
import type { BookingRepository } from './bookingRepository';
import { JsonFileStore } from './jsonFileStore';

// Bookings kept in <dataDir>/bookings.json
export class JsonBookingRepository implements BookingRepository {
  private readonly store: JsonFileStore<Booking>;

  constructor(dataDir: string) {
    this.store = new JsonFileStore(dataDir, 'bookings.json', bookingSchema);
  }

  save(booking: Booking): Promise<Booking> {
    return this.store.mutate(records => {
      records.push(booking);
      return { result: booking, write: true };
    });
  }

  async findById(id: string): Promise<Booking | undefined> {
    const records = await this.store.readAll();
    return records.find(b => b.id === id);
  }

  findAll(): Promise<Booking[]> {
    return this.store.readAll();
  }

  async findByCarAndDateRange(carId: string, startDate: CalendarDate, endDate: CalendarDate): Promise<Booking[]> {
    const records = await this.store.readAll();
    return records.filter(
      b => b.carId === carId && intervalsOverlap(startDate, endDate, b.startDate, b.endDate)
    );
  }

  update(booking: Booking): Promise<Booking | undefined> {
    return this.store.mutate<Booking | undefined>(records => {
      const index = records.findIndex(b => b.id === booking.id);
      if (index === -1) return { result: undefined, write: false };
      records[index] = booking;
      return { result: booking, write: true };
    });
  }

  delete(id: string): Promise<boolean> {
    return this.store.mutate(records => {
      const index = records.findIndex(b => b.id === id);
      if (index === -1) return { result: false, write: false };
      records.splice(index, 1);
      return { result: true, write: true };
    });
  }
}
