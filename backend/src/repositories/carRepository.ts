import type { Car } from '../models/structures';

// Car Store
export interface CarRepository {
  save(car: Car): Promise<Car>;
  findById(id: string): Promise<Car | undefined>;
  findAll(): Promise<Car[]>;
  /** Resolves to undefined when no car has this id. */
  update(car: Car): Promise<Car | undefined>;
  /** True iff a record was removed. */
  delete(id: string): Promise<boolean>;
}
