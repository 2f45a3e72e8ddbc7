import type { Car } from '../models/structures';
import { carSchema } from '../models/schemas';
import type { CarRepository } from './carRepository';
import { JsonFileStore } from './jsonFileStore';

// Cars kept in <dataDir>/cars.json
export class JsonCarRepository implements CarRepository {
  private readonly store: JsonFileStore<Car>;

  constructor(dataDir: string) {
    this.store = new JsonFileStore(dataDir, 'cars.json', carSchema);
  }

  save(car: Car): Promise<Car> {
    return this.store.mutate(records => {
      records.push(car);
      return { result: car, write: true };
    });
  }

  async findById(id: string): Promise<Car | undefined> {
    const records = await this.store.readAll();
    return records.find(c => c.id === id);
  }

  findAll(): Promise<Car[]> {
    return this.store.readAll();
  }

  update(car: Car): Promise<Car | undefined> {
    return this.store.mutate<Car | undefined>(records => {
      const index = records.findIndex(c => c.id === car.id);
      if (index === -1) return { result: undefined, write: false };
      records[index] = car;
      return { result: car, write: true };
    });
  }

  delete(id: string): Promise<boolean> {
    return this.store.mutate(records => {
      const index = records.findIndex(c => c.id === id);
      if (index === -1) return { result: false, write: false };
      records.splice(index, 1);
      return { result: true, write: true };
    });
  }
}
