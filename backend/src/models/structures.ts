
// Possible car statuses
export type CarStatus = 'available' | 'rented' | 'maintenance';

// Possible booking statuses. Only pending and confirmed bookings hold a car.
export type BookingStatus = 'pending' | 'confirmed' | 'cancelled' | 'completed';

// Calendar date, "YYYY-MM-DD"
export type CalendarDate = string;

// Car data structure
export interface Car {
    id: string;
    brand: string;
    model: string;
    year: number;
    licensePlate: string;
    dailyRate: number;
    status: CarStatus;
    createdAt: string;      // (ISO format)
    updatedAt?: string;
}

// Booking data structure
export interface Booking {
    id: string;
    carId: string;
    customerName: string;
    customerEmail: string;
    startDate: CalendarDate;
    endDate: CalendarDate;  // exclusive
    totalCost: number;
    status: BookingStatus;
    createdAt: string;
    updatedAt?: string;
}

export type ServiceErrorCode =
  | 'INVALID_INPUT'
  | 'CAR_NOT_FOUND'
  | 'BOOKING_NOT_FOUND'
  | 'CAR_NOT_AVAILABLE';

export type ServiceError = {
  code: ServiceErrorCode;
  message: string;
};

export type Ok<T> = { ok: true; data: T };
export type Err = { ok: false; error: ServiceError };
export type Result<T> = Ok<T> | Err;

// Result constructors
export function ok<T>(data: T): Ok<T> {
  return { ok: true, data };
}

export function err(code: ServiceErrorCode, message: string): Err {
  return { ok: false, error: { code, message } };
}
