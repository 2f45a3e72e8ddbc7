import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/config';
import type { Logger } from './lib/logger';
import type { BookingService } from './services/bookingService';
import type { CarService } from './services/carService';
import { createCarsRouter } from './routes (APIs)/cars';
import { createBookingsRouter } from './routes (APIs)/bookings';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export type AppDeps = {
  config: Pick<AppConfig, 'apiPrefix' | 'version'>;
  carService: CarService;
  bookingService: BookingService;
  logger: Logger;
};

export function createApp({ config, carService, bookingService, logger }: AppDeps): express.Express {
  const app = express();

  // Middlewares
  app.use(cors());
  app.use(express.json());

  // Routes
  app.use(`${config.apiPrefix}/cars`, createCarsRouter({ carService, bookingService, logger: logger.child('cars') }));
  app.use(`${config.apiPrefix}/bookings`, createBookingsRouter({ bookingService, logger: logger.child('bookings') }));

  app.get('/', (_req, res) => {
    res.json({ message: 'Car Rental API', version: config.version });
  });

  // Healthcheck
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(notFoundHandler());
  app.use(errorHandler(logger));

  return app;
}
