import type { Booking, CalendarDate, Car } from '../models/structures';
import { intervalsOverlap } from '../services/availability';
import type { BookingRepository } from './bookingRepository';
import type { CarRepository } from './carRepository';

// Records live in insertion order; callers get copies, never the stored objects.
class InMemoryStore<T extends { id: string }> {
  private readonly records = new Map<string, T>();

  constructor(seed: T[] = []) {
    for (const record of seed) this.records.set(record.id, { ...record });
  }

  save(record: T): T {
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  findById(id: string): T | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  findAll(): T[] {
    return [...this.records.values()].map(r => ({ ...r }));
  }

  update(record: T): T | undefined {
    if (!this.records.has(record.id)) return undefined;
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  delete(id: string): boolean {
    return this.records.delete(id);
  }
}

export class InMemoryCarRepository implements CarRepository {
  private readonly store: InMemoryStore<Car>;

  constructor(seed: Car[] = []) {
    this.store = new InMemoryStore(seed);
  }

  async save(car: Car): Promise<Car> {
    return this.store.save(car);
  }

  async findById(id: string): Promise<Car | undefined> {
    return this.store.findById(id);
  }

  async findAll(): Promise<Car[]> {
    return this.store.findAll();
  }

  async update(car: Car): Promise<Car | undefined> {
    return this.store.update(car);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }
}

export class InMemoryBookingRepository implements BookingRepository {
  private readonly store: InMemoryStore<Booking>;

  constructor(seed: Booking[] = []) {
    this.store = new InMemoryStore(seed);
  }

  async save(booking: Booking): Promise<Booking> {
    return this.store.save(booking);
  }

  async findById(id: string): Promise<Booking | undefined> {
    return this.store.findById(id);
  }

  async findAll(): Promise<Booking[]> {
    return this.store.findAll();
  }

  async findByCarAndDateRange(carId: string, startDate: CalendarDate, endDate: CalendarDate): Promise<Booking[]> {
    return this.store
      .findAll()
      .filter(b => b.carId === carId && intervalsOverlap(startDate, endDate, b.startDate, b.endDate));
  }

  async update(booking: Booking): Promise<Booking | undefined> {
    return this.store.update(booking);
  }

  async delete(id: string): Promise<boolean> {
    return this.store.delete(id);
  }
}
