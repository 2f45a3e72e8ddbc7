import { Car, CarStatus, Result, ok } from '../models/structures';
import { NewCarInput, newCar } from '../models/entities';
import type { CarRepository } from '../repositories/carRepository';

export type CarServiceDeps = {
  cars: CarRepository;
  now?: () => Date;
};

// Car lookups answer "absent" with undefined/false rather than an error result.
export function createCarService({ cars, now = () => new Date() }: CarServiceDeps) {
  // CREATE a new car (status defaults to available)
  async function createCar(input: NewCarInput): Promise<Result<Car>> {
    const built = newCar(input, now());
    if (!built.ok) return built;
    return ok(await cars.save(built.data));
  }

  async function getCar(id: string): Promise<Car | undefined> {
    return cars.findById(id);
  }

  async function listAllCars(): Promise<Car[]> {
    return cars.findAll();
  }

  async function listAvailableCars(): Promise<Car[]> {
    const all = await cars.findAll();
    return all.filter(c => c.status === 'available');
  }

  // EDIT car status; undefined when the car does not exist
  async function updateCarStatus(id: string, status: CarStatus): Promise<Car | undefined> {
    const car = await cars.findById(id);
    if (!car) return undefined;

    return cars.update({ ...car, status, updatedAt: now().toISOString() });
  }

  // DELETE a car. Its bookings are left in place.
  async function deleteCar(id: string): Promise<boolean> {
    return cars.delete(id);
  }

  return { createCar, getCar, listAllCars, listAvailableCars, updateCarStatus, deleteCar };
}

export type CarService = ReturnType<typeof createCarService>;
