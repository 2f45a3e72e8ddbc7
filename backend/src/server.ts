import { createApp } from './app';
import { AppConfig, loadConfig } from './config/config';
import { createLogger } from './lib/logger';
import type { BookingRepository } from './repositories/bookingRepository';
import type { CarRepository } from './repositories/carRepository';
import { InMemoryBookingRepository, InMemoryCarRepository } from './repositories/inMemoryRepositories';
import { JsonBookingRepository } from './repositories/jsonBookingRepository';
import { JsonCarRepository } from './repositories/jsonCarRepository';
import { createBookingService } from './services/bookingService';
import { createCarService } from './services/carService';

function createRepositories(config: AppConfig): { cars: CarRepository; bookings: BookingRepository } {
  if (config.storage === 'memory') {
    return { cars: new InMemoryCarRepository(), bookings: new InMemoryBookingRepository() };
  }
  return { cars: new JsonCarRepository(config.dataDir), bookings: new JsonBookingRepository(config.dataDir) };
}

const config = loadConfig();
const logger = createLogger('car-rental', config.logLevel);

const { cars, bookings } = createRepositories(config);
const app = createApp({
  config,
  carService: createCarService({ cars }),
  bookingService: createBookingService({ cars, bookings }),
  logger,
});

// Boot
app.listen(config.port, () => {
  logger.info(`API listening on http://localhost:${config.port}${config.apiPrefix}`, {
    environment: config.environment,
    storage: config.storage,
    dataDir: config.dataDir,
  });
});
