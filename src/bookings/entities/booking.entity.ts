import type { CoachType, ScheduleDetails } from '../../schedules/entities/schedule.entity';

/**
 * `created` only exists inside the booking transaction; rows are persisted as
 * `payment_pending` and move on when a payment attempt is recorded.
 */
export const BOOKING_STATUSES = ['created', 'payment_pending', 'confirmed', 'payment_failed'] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export const SEAT_PREFERENCES = ['no_preference', 'window', 'aisle', 'lower', 'middle', 'upper'] as const;
export type SeatPreference = (typeof SEAT_PREFERENCES)[number];

export interface PassengerDetails {
  name: string;
  age: number;
  seatPreference: SeatPreference;
}

export interface Passenger extends PassengerDetails {
  id: number;
  seatNumber: string;
}

export interface Booking {
  id: number;
  pnr: string;
  scheduleId: number;
  coachTypeId: number;
  email: string | null;
  status: BookingStatus;
  passengerCount: number;
  totalFareCents: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface BookingDetails extends Booking {
  schedule: ScheduleDetails;
  coachType: CoachType;
  passengers: Passenger[];
}

export interface NewBooking {
  scheduleId: number;
  coachTypeId: number;
  email: string | null;
  passengers: PassengerDetails[];
  totalFareCents: number;
  /** Builds the PNR once the booking id has been drawn from the sequence. */
  pnrFor: (bookingId: number) => string;
}

export type CreateBookingResult =
  | { outcome: 'created'; booking: Booking; seatsAvailable: number }
  | { outcome: 'schedule_not_found' }
  | { outcome: 'insufficient_seats'; seatsAvailable: number };

export type PaymentStatus = 'success' | 'failed';

export interface PaymentAttempt {
  pnr: string;
  approved: boolean;
  method: 'CARD';
  cardLast4: string;
}

export type RecordPaymentResult =
  | { outcome: 'recorded'; bookingId: number; status: BookingStatus; amountCents: number }
  | { outcome: 'booking_not_found' }
  | { outcome: 'already_confirmed' };
