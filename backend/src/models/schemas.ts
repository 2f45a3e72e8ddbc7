import { z } from 'zod';
import type { Booking, Car } from './structures';

export const calendarDateSchema = z.string().date();

export const carStatusSchema = z.enum(['available', 'rented', 'maintenance']);

export const bookingStatusSchema = z.enum(['pending', 'confirmed', 'cancelled', 'completed']);

export const carFields = {
  brand: z.string().min(1).max(50),
  model: z.string().min(1).max(50),
  year: z.number().int().min(1900).max(2100),
  licensePlate: z.string().min(1).max(20),
  dailyRate: z.number().positive().finite(),
};

export const bookingFields = {
  carId: z.string().uuid(),
  customerName: z.string().min(1).max(100),
  customerEmail: z.string().min(1).max(100),
  startDate: calendarDateSchema,
  endDate: calendarDateSchema,
};

// Stored records. Reading never re-applies creation-time rules such as "start not in the past".
export const carSchema: z.ZodType<Car> = z.object({
  id: z.string().uuid(),
  ...carFields,
  status: carStatusSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime().optional(),
});

export const bookingSchema: z.ZodType<Booking> = z
  .object({
    id: z.string().uuid(),
    ...bookingFields,
    totalCost: z.number().positive().finite(),
    status: bookingStatusSchema,
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime().optional(),
  })
  .refine(b => b.endDate > b.startDate, { message: 'endDate must be after startDate', path: ['endDate'] });

// Request bodies
export const createCarRequestSchema = z.object(carFields);

export const updateCarStatusRequestSchema = z.object({ status: carStatusSchema });

export const createBookingRequestSchema = z.object(bookingFields);

export const idParamSchema = z.string().uuid();

// Query-string flag: true/false, 1/0, yes/no, on/off, any case
export const queryFlagSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform(v => v === 'true' || v === '1' || v === 'yes' || v === 'on');

export const listCarsQuerySchema = z
  .object({
    availableOnly: queryFlagSchema.optional().transform(v => v === true),
    startDate: calendarDateSchema.optional(),
    endDate: calendarDateSchema.optional(),
  })
  .refine(q => (q.startDate === undefined) === (q.endDate === undefined), {
    message: 'startDate and endDate must be given together',
  })
  .refine(q => q.startDate === undefined || q.endDate === undefined || q.endDate > q.startDate, {
    message: 'endDate must be after startDate',
  });

// "field: message; field: message"
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
