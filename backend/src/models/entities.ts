import { v4 as uuidv4 } from 'uuid';
import { bookingFields, bookingSchema, carSchema, describeIssues } from './schemas';
import { Booking, Car, CarStatus, Result, err, ok } from './structures';
import { toCalendarDate } from '../lib/dates';
import { z } from 'zod';

export type NewCarInput = {
  brand: string;
  model: string;
  year: number;
  licensePlate: string;
  dailyRate: number;
  status?: CarStatus;
};

export type NewBookingInput = {
  carId: string;
  customerName: string;
  customerEmail: string;
  startDate: string;
  endDate: string;
};

const bookingDraftSchema = z.object(bookingFields);

/** Builds a validated car with a fresh id and creation timestamp. */
export function newCar(input: NewCarInput, now: Date = new Date()): Result<Car> {
  const parsed = carSchema.safeParse({
    id: uuidv4(),
    ...input,
    status: input.status ?? 'available',
    createdAt: now.toISOString(),
  });
  if (!parsed.success) return err('INVALID_INPUT', describeIssues(parsed.error));
  return ok(parsed.data);
}

/**
 * Builds a validated pending booking.
 *
 * Rejects an empty or inverted date range and a start date before today (UTC).
 * `totalCost` is computed by the caller and must be positive and finite.
 */
export function newBooking(input: NewBookingInput, totalCost: number, now: Date = new Date()): Result<Booking> {
  const draft = bookingDraftSchema.safeParse(input);
  if (!draft.success) return err('INVALID_INPUT', describeIssues(draft.error));

  const { startDate, endDate } = draft.data;
  if (endDate <= startDate) return err('INVALID_INPUT', 'endDate must be after startDate');
  if (startDate < toCalendarDate(now)) return err('INVALID_INPUT', 'startDate cannot be in the past');
  if (!Number.isFinite(totalCost)) return err('INVALID_INPUT', 'totalCost must be a finite number');

  const parsed = bookingSchema.safeParse({
    id: uuidv4(),
    ...draft.data,
    totalCost,
    status: 'pending',
    createdAt: now.toISOString(),
  });
  if (!parsed.success) return err('INVALID_INPUT', describeIssues(parsed.error));
  return ok(parsed.data);
}
